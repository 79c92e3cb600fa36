import { z } from 'zod';
import { ConfigError } from '../errors';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => v === 'true' || v === '1');

const configSchema = z.object({
  // NCBI asks every E-utilities client to identify itself with a contact address and tool name
  ncbiEmail: z.string().min(1).default('your_email@example.com'),
  ncbiApiKey: z.string().min(1).optional(),
  ncbiTool: z.string().min(1).default('get-papers-list'),

  maxResults: z.coerce.number().int().positive().default(100),
  outputFile: z.string().min(1).default('pubmed_results.csv'),

  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  logPretty: booleanFlag,
});

export type AppConfig = z.infer<typeof configSchema>;

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse({
    ncbiEmail: nonEmpty(env.NCBI_EMAIL),
    ncbiApiKey: nonEmpty(env.NCBI_API_KEY),
    ncbiTool: nonEmpty(env.NCBI_TOOL),
    maxResults: nonEmpty(env.PUBMED_MAX_RESULTS),
    outputFile: nonEmpty(env.PUBMED_OUTPUT_FILE),
    logLevel: nonEmpty(env.LOG_LEVEL),
    logPretty: nonEmpty(env.LOG_PRETTY),
  });
  if (!parsed.success) {
    throw new ConfigError(parsed.error);
  }
  return parsed.data;
}
