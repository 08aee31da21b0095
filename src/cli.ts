import { parseArgs } from 'node:util';
import { z } from 'zod';
import { config } from './config.js';
import { UsageError } from './types/api-types.js';

const TRUE_VALUES = ['1', 'true', 'yes'];

export const RuntimeOptionsSchema = z.object({
  transport: z.enum(['stdio', 'http']),
  host: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535),
  stateless: z.boolean(),
});

export type RuntimeOptions = z.infer<typeof RuntimeOptionsSchema>;

export const USAGE = `Usage: ${config.NAME} [options]

Options:
  --transport <stdio|http>  transport to serve on (env MCP_TRANSPORT, default ${config.DEFAULT_TRANSPORT})
  --host <host>             HTTP bind address (env HOST, default ${config.DEFAULT_HOST})
  --port <port>             HTTP port (env PORT, default ${config.DEFAULT_PORT})
  --stateless               serve HTTP without sessions (env MCP_STATELESS)
  -h, --help                show this help`;

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        transport: { type: 'string' },
        host: { type: 'string' },
        port: { type: 'string' },
        stateless: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error), error);
  }
}

/**
 * Resolves transport options: command-line flags win over the environment,
 * which wins over the defaults in config.ts.
 */
export function resolveRuntimeOptions(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): RuntimeOptions | 'help' {
  const { values } = parseFlags(argv);

  if (values.help) {
    return 'help';
  }

  const parsed = RuntimeOptionsSchema.safeParse({
    transport: values.transport ?? env.MCP_TRANSPORT ?? config.DEFAULT_TRANSPORT,
    host: values.host ?? env.HOST ?? config.DEFAULT_HOST,
    port: values.port ?? env.PORT ?? config.DEFAULT_PORT,
    stateless: values.stateless ?? TRUE_VALUES.includes((env.MCP_STATELESS ?? '').toLowerCase()),
  });

  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new UsageError(`Invalid option '${issue.path.join('.')}': ${issue.message}`);
  }
  return parsed.data;
}
