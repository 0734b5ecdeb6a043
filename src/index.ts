/**
 * S3 upload signer
 *
 * AWS Signature Version 4 signing and PUT uploads for S3-compatible object
 * stores, without a vendor SDK:
 * - Canonical request, string to sign and signing key derivation
 * - Authorization header and finalized signed headers
 * - Presigned GET/PUT URLs
 * - Single and batch object uploads over fetch
 * - Typed errors naming the pipeline stage that failed
 *
 * @example
 * ```typescript
 * import {
 *   ObjectUploader,
 *   EnvironmentCredentialsProvider,
 *   FilePayloadSource,
 *   createConfigFromEnv,
 * } from 's3-upload-signer';
 *
 * const uploader = new ObjectUploader({
 *   config: createConfigFromEnv(),
 *   credentials: new EnvironmentCredentialsProvider(),
 * });
 *
 * await uploader.upload({
 *   key: 'reports/2021-01.csv',
 *   body: new FilePayloadSource('./2021-01.csv'),
 *   contentType: 'text/csv',
 * });
 * ```
 */

// ============================================================================
// Signing
// ============================================================================

export * from './signing/index.js';

// ============================================================================
// Credentials
// ============================================================================

export * from './auth/index.js';

// ============================================================================
// Configuration
// ============================================================================

export * from './config/index.js';

// ============================================================================
// Errors
// ============================================================================

export * from './errors/index.js';

// ============================================================================
// Payloads, transport and uploads
// ============================================================================

export * from './payload/index.js';
export * from './transport/index.js';
export * from './xml/index.js';
export * from './upload/index.js';

// ============================================================================
// Observability
// ============================================================================

export * from './observability/index.js';
