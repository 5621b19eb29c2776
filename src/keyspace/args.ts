import { readFile } from 'node:fs/promises'
import { parseArgs } from 'node:util'
import { ConfigurationError, errorMessage } from '../plumbing/errors.ts'
import type { RawModuleParams } from './params.ts'

const ENV_PARAMS = {
  CASSANDRA_LOGIN_HOSTS: 'login_hosts',
  CASSANDRA_LOGIN_PORT: 'login_port',
  CASSANDRA_LOGIN_USER: 'login_user',
  CASSANDRA_LOGIN_PASSWORD: 'login_password',
} as const

export const USAGE = [
  'Usage: keyspace [args-file.json] [options]',
  '  --name <keyspace>            keyspace to manage',
  '  --topology <strategy>        SimpleStrategy | NetworkTopologyStrategy',
  '  --datacenter <name>          datacenter for NetworkTopologyStrategy',
  '  --replication-factor <n>     replication factor (default 1)',
  '  --durable-writes <bool>      durable writes (default true)',
  '  --state <present|absent>     desired state (default present)',
  '  --login-hosts <h1,h2>        contact points',
  '  --login-port <port>          CQL port (default 9042)',
  '  --login-user <user>          login user',
  '  --login-password <password>  login password',
  '  --check                      report the change without applying it',
].join('\n')

const readEnvParams = (env: NodeJS.ProcessEnv): RawModuleParams => {
  const params: RawModuleParams = {}
  for (const [variable, param] of Object.entries(ENV_PARAMS)) {
    const value = env[variable]
    if (value !== undefined) {
      params[param] = value
    }
  }
  return params
}

const readArgsFile = async (path: string): Promise<RawModuleParams> => {
  let parsed: unknown
  try {
    parsed = JSON.parse(await readFile(path, 'utf8'))
  } catch (error) {
    throw new ConfigurationError(
      `unable to read module arguments from ${path}: ${errorMessage(error)}`,
      { cause: error },
    )
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(
      `module arguments in ${path} must be a JSON object`,
    )
  }
  return { ...parsed }
}

const parseCommandLine = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        name: { type: 'string' },
        topology: { type: 'string' },
        datacenter: { type: 'string' },
        'replication-factor': { type: 'string' },
        'durable-writes': { type: 'string' },
        state: { type: 'string' },
        'login-hosts': { type: 'string' },
        'login-port': { type: 'string' },
        'login-user': { type: 'string' },
        'login-password': { type: 'string' },
        check: { type: 'boolean' },
      },
    })
  } catch (error) {
    throw new ConfigurationError(`${errorMessage(error)}\n${USAGE}`, {
      cause: error,
    })
  }
}

/**
 * Collects raw module parameters. Later sources win: environment, then the
 * JSON args file, then command-line flags.
 */
export const readModuleArgs = async (
  argv: string[],
  env: NodeJS.ProcessEnv,
): Promise<RawModuleParams> => {
  const { values, positionals } = parseCommandLine(argv)

  if (positionals.length > 1) {
    throw new ConfigurationError(
      `expected at most one args file, got ${positionals.length}\n${USAGE}`,
    )
  }

  const [argsFile] = positionals
  const fileParams = argsFile ? await readArgsFile(argsFile) : {}

  const flagParams: RawModuleParams = {
    name: values.name,
    topology: values.topology,
    datacenter: values.datacenter,
    replication_factor: values['replication-factor'],
    durable_writes: values['durable-writes'],
    state: values.state,
    login_hosts: values['login-hosts'],
    login_port: values['login-port'],
    login_user: values['login-user'],
    login_password: values['login-password'],
    check_mode: values.check,
  }
  const definedFlagParams = Object.fromEntries(
    Object.entries(flagParams).filter(([, value]) => value !== undefined),
  )

  return {
    ...readEnvParams(env),
    ...fileParams,
    ...definedFlagParams,
  }
}
