/**
 * Default lifetime of presigned upload and download URLs (15 minutes)
 */
export const DEFAULT_UPLOAD_URL_TTL_SECONDS = 15 * 60;

/**
 * Get the DynamoDB photo metadata table name from environment variables
 * @returns DynamoDB table name
 * @throws Error if the environment variable is not set
 */
export function getEnvTableName(): string {
  return getEnvStringVar('PHOTO_TABLE_NAME');
}

/**
 * Get the S3 photo bucket name from environment variables
 * @returns S3 bucket name
 * @throws Error if the environment variable is not set
 */
export function getEnvBucketName(): string {
  return getEnvStringVar('PHOTO_BUCKET_NAME');
}

/**
 * Get the AWS region, falling back to AWS_DEFAULT_REGION and then us-east-1
 */
export function getEnvAwsRegion(): string {
  return process.env.AWS_REGION || process.env.AWS_DEFAULT_REGION || 'us-east-1';
}

/**
 * Get the family ids allowed to use the API.
 * An empty set means the allow-list is disabled and every family id is accepted.
 * @returns Set of trimmed, non-empty family ids from ALLOWED_FAMILY_IDS
 */
export function getEnvAllowedFamilyIds(): ReadonlySet<string> {
  return parseFamilyIdList(process.env.ALLOWED_FAMILY_IDS ?? '');
}

/**
 * Get the presigned URL lifetime in seconds
 * @returns Lifetime of upload and download URLs
 * @throws Error if UPLOAD_URL_TTL_SECONDS is set but not a positive integer
 */
export function getEnvUploadUrlTtlSeconds(defaultValue = DEFAULT_UPLOAD_URL_TTL_SECONDS): number {
  const ttl = getEnvIntVar('UPLOAD_URL_TTL_SECONDS', parseInt, defaultValue);
  if (ttl <= 0) {
    throw new Error('UPLOAD_URL_TTL_SECONDS environment variable must be a positive integer');
  }
  return ttl;
}

/**
 * Split a comma-separated family id list into a set
 * @param raw Raw list, e.g. "alice, bob,,carol"
 */
export function parseFamilyIdList(raw: string): ReadonlySet<string> {
  return new Set(
    raw
      .split(',')
      .map((value) => value.trim())
      .filter((value) => value.length > 0)
  );
}

/**
 * Helper function to retrieve and validate string environment variables
 * @param varName Name of the environment variable
 * @returns Value of the environment variable
 * @throws Error if the environment variable is not set
 */
function getEnvStringVar(varName: string): string {
  const value = process.env[varName];
  if (!value) {
    throw new Error(`${varName} environment variable is not set`);
  }
  return value;
}

/**
 * Helper function to retrieve and validate integer environment variables
 * @param varName Name of the environment variable
 * @param parser Function to parse the string value to an integer
 * @param defaultValue Optional default value if the environment variable is not set
 * @returns Integer value of the environment variable
 * @throws Error if no default value is provided and the environment variable
 *          is not set or not a valid integer
 */
function getEnvIntVar(
  varName: string,
  parser: (value: string, radix?: number) => number,
  defaultValue?: number
): number {
  const value = process.env[varName];
  if (!value) {
    if (defaultValue === undefined) {
      throw new Error(`${varName} environment variable is not set`);
    }
    return defaultValue;
  }
  const intValue = /^\s*-?\d+\s*$/.test(value) ? parser(value, 10) : NaN;
  if (isNaN(intValue)) {
    throw new Error(`${varName} environment variable must be a valid integer`);
  }
  return intValue;
}
