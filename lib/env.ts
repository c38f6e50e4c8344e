type EnvSource = Record<string, string | undefined>;

const firstDefined = (source: EnvSource, ...keys: string[]): string => {
  for (const key of keys) {
    const value = source[key];
    if (value && value.trim().length > 0) return value.trim();
  }
  return '';
};

const positiveNumber = (raw: string, fallback: number): number => {
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
};

export const parseVaultIds = (raw: string): string[] =>
  raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

export interface JobManagementEnv {
  supabaseUrl: string;
  supabaseServiceKey: string;
  jobDetailsTable: string;
  managementUrl: string;
  region: string;
  applicationId: string;
  validVaultIds: string[];
  tokenClaim: string;
  authTimeoutMs: number;
  dbTimeoutMs: number;
  cancelTimeoutMs: number;
  logLevel: string;
  logFormat: 'json' | 'simple';
}

export const readEnv = (source: EnvSource = process.env): JobManagementEnv => {
  const supabaseUrl = firstDefined(source, 'SUPABASE_URL', 'NEXT_PUBLIC_SUPABASE_URL');
  const supabaseServiceKey = firstDefined(source, 'SUPABASE_SERVICE_ROLE_KEY', 'SUPABASE_SERVICE_KEY');
  const managementUrl = firstDefined(source, 'MANAGEMENT_URL').replace(/\/+$/, '');
  const applicationId = firstDefined(source, 'APPLICATION_ID');
  const validVaultIds = parseVaultIds(firstDefined(source, 'VALID_VAULT_IDS'));

  if (!supabaseUrl) {
    console.warn('Missing env var: SUPABASE_URL (or NEXT_PUBLIC_SUPABASE_URL)');
  }
  if (!supabaseServiceKey) {
    console.warn('Missing env var: SUPABASE_SERVICE_ROLE_KEY (or SUPABASE_SERVICE_KEY)');
  }
  if (!managementUrl) {
    console.warn('Missing env var: MANAGEMENT_URL');
  }
  if (!applicationId) {
    console.warn('Missing env var: APPLICATION_ID');
  }
  if (validVaultIds.length === 0) {
    console.warn('VALID_VAULT_IDS is empty; every vault ID will be rejected');
  }

  return {
    supabaseUrl,
    supabaseServiceKey,
    jobDetailsTable: firstDefined(source, 'JOB_DETAILS_TABLE') || 'emr_job_details',
    managementUrl,
    region: firstDefined(source, 'REGION', 'AWS_REGION'),
    applicationId,
    validVaultIds,
    tokenClaim: firstDefined(source, 'TOKEN_CLAIM') || 'jti',
    authTimeoutMs: positiveNumber(firstDefined(source, 'AUTH_TIMEOUT_MS'), 60_000),
    dbTimeoutMs: positiveNumber(firstDefined(source, 'DB_TIMEOUT_MS'), 10_000),
    cancelTimeoutMs: positiveNumber(firstDefined(source, 'CANCEL_TIMEOUT_MS'), 30_000),
    logLevel: firstDefined(source, 'LOG_LEVEL') || 'info',
    logFormat: firstDefined(source, 'LOG_FORMAT') === 'simple' ? 'simple' : 'json'
  };
};
