import type { Handler } from '@netlify/functions';
import { createVaultAuthorizer } from '../../lib/auth/authorization';
import { createJobRecordStore } from '../../lib/db/jobs';
import { readEnv } from '../../lib/env';
import { createEmrClient, createEmrExecutionClient } from '../../lib/execution';
import { createLogger } from '../../lib/logger';
import { createSupabaseAdmin } from '../../lib/supabase';
import { createJobManagementHandler } from './_job-handler';

const env = readEnv();
const emr = createEmrClient(env.region);

const handler: Handler = createJobManagementHandler({
  validVaultIds: env.validVaultIds,
  tokenClaim: env.tokenClaim,
  authorize: createVaultAuthorizer({ managementUrl: env.managementUrl, timeoutMs: env.authTimeoutMs }),
  store: createJobRecordStore(createSupabaseAdmin(env.supabaseUrl, env.supabaseServiceKey), {
    table: env.jobDetailsTable,
    timeoutMs: env.dbTimeoutMs
  }),
  executor: createEmrExecutionClient(
    { send: (command, options) => emr.send(command, options) },
    { applicationId: env.applicationId, timeoutMs: env.cancelTimeoutMs }
  ),
  logger: createLogger({ level: env.logLevel, format: env.logFormat })
});

export { handler };
