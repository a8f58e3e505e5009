import process from 'node:process'
import {homedir} from 'node:os'
import {readFile} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {z} from 'zod'
import {ConfigError} from '../errors.js'
import {expandHome} from './utils.js'

export const CONFIG_FILE_NAME = '.groundwork.yml'

const ProbeSchema = z.array(z.string().min(1)).min(1)

export const PackageSpecSchema = z.object({
  /** Step suffix and display name (install-<name>). */
  name: z.string().trim().min(1),
  apt: z.array(z.string().trim().min(1)).min(1),
  /** Version probes run after install; the first one feeds the summary. */
  probes: z.array(ProbeSchema).default([]),
  /** When true, failing probes are reported but never fail the step. */
  optionalProbe: z.boolean().default(false)
})

export type PackageSpec = z.infer<typeof PackageSpecSchema>

const ESSENTIAL_PACKAGES = ['unzip', 'curl', 'gnupg', 'software-properties-common']

const DEFAULT_PACKAGES: Array<z.input<typeof PackageSpecSchema>> = [
  {name: 'unzip', apt: ['unzip'], probes: [['unzip', '-v']]},
  {name: 'tree', apt: ['tree'], probes: [['tree', '--version']]},
  {name: 'curl', apt: ['curl'], probes: [['curl', '--version']]},
  {name: 'net-tools', apt: ['net-tools'], probes: [['netstat', '-V']], optionalProbe: true},
  {name: 'python', apt: ['python3', 'python3-pip'], probes: [['python3', '--version'], ['pip3', '--version']]},
  {name: 'git', apt: ['git'], probes: [['git', '--version']]},
  {name: 'jq', apt: ['jq'], probes: [['jq', '--version']]},
  {name: 'htop', apt: ['htop'], probes: [['htop', '--version']]},
  {name: 'tmux', apt: ['tmux'], probes: [['tmux', '-V']]}
]

export const BootstrapConfigSchema = z.object({
  timezone: z.string().trim().min(1).default('America/New_York'),
  essentialPackages: z.array(z.string().trim().min(1)).default(ESSENTIAL_PACKAGES),
  packages: z.array(PackageSpecSchema)
    .refine(list => new Set(list.map(spec => spec.name)).size === list.length, 'package names must be unique')
    .default(DEFAULT_PACKAGES),
  awsCli: z.object({
    url: z.string().url().default('https://awscli.amazonaws.com/awscli-exe-linux-x86_64.zip')
  }).default({}),
  sshKey: z.object({
    path: z.string().min(1).default('~/.ssh/zero-node-key'),
    copyPath: z.string().min(1).default('~/projects/.ssh_terr_0_node'),
    comment: z.string().default('zero-node-key'),
    bits: z.number().int().min(2048).default(4096)
  }).default({}),
  publicIp: z.object({
    url: z.string().url().default('https://ifconfig.me/ip'),
    file: z.string().min(1).default('~/projects/publicip'),
    timeoutMs: z.number().int().positive().default(10_000)
  }).default({})
})

export type BootstrapConfig = z.infer<typeof BootstrapConfigSchema>

export const BackendConfigSchema = z.object({
  region: z.string().trim().min(1).default('us-east-1'),
  bucketPrefix: z.string().trim().min(1).default('terraform-backend-zero'),
  lockTablePrefix: z.string().trim().min(1).default('terraform-locks-zero'),
  /** Fixed names replace the timestamped ones, which makes reruns converge. */
  bucketName: z.string().trim().min(3).optional(),
  lockTableName: z.string().trim().min(3).optional(),
  stateKey: z.string().trim().min(1).default('terraform.tfstate'),
  encrypt: z.boolean().default(true),
  essentialPackages: z.array(z.string().trim().min(1)).default(ESSENTIAL_PACKAGES),
  hashicorp: z.object({
    keyUrl: z.string().url().default('https://apt.releases.hashicorp.com/gpg'),
    repoUrl: z.string().url().default('https://apt.releases.hashicorp.com'),
    keyring: z.string().min(1).default('/usr/share/keyrings/hashicorp-archive-keyring.gpg'),
    sourcesList: z.string().min(1).default('/etc/apt/sources.list.d/hashicorp.list'),
    packages: z.array(PackageSpecSchema).default([
      {name: 'terraform', apt: ['terraform'], probes: [['terraform', '-version']]},
      {name: 'vault', apt: ['vault'], probes: [['vault', '-version']]}
    ])
  }).default({}),
  lockTablePoll: z.object({
    intervalMs: z.number().int().nonnegative().default(2000),
    maxAttempts: z.number().int().positive().default(30),
    onExhausted: z.enum(['fail', 'warn']).default('fail')
  }).default({}),
  vault: z.object({
    address: z.string().url().default('http://127.0.0.1:8200'),
    logFile: z.string().min(1).default('/tmp/vault-dev.log'),
    tokenFile: z.string().min(1).default('~/projects/.hcl_vault_token'),
    pidFile: z.string().min(1).default('~/projects/.vault-dev.pid'),
    readiness: z.object({
      maxAttempts: z.number().int().positive().default(10),
      initialDelayMs: z.number().int().nonnegative().default(250),
      maxDelayMs: z.number().int().nonnegative().default(4000)
    }).default({})
  }).default({})
})

export type BackendSettings = z.infer<typeof BackendConfigSchema>

export const ConfigSchema = z.object({
  home: z.string().min(1).optional(),
  bootstrap: BootstrapConfigSchema.default({}),
  backend: BackendConfigSchema.default({})
}).strict()

/** Fully resolved configuration: defaults applied, `~` expanded. */
export type GroundworkConfig = {
  home: string;
  bootstrap: BootstrapConfig;
  backend: BackendSettings;
}

export type LoadConfigOptions = {
  /** Explicit config file. A missing explicit file is an error. */
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Loads the project-level `.groundwork.yml` configuration.
 *
 * Precedence: built-in defaults < config file < environment
 * (`GROUNDWORK_HOME`, `AWS_REGION`). The file is `GROUNDWORK_CONFIG` or
 * `.groundwork.yml` in `cwd` when no explicit path is given, and may be absent.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<GroundworkConfig> {
  const env = options.env ?? process.env
  const cwd = options.cwd ?? process.cwd()
  const explicit = options.path ?? env.GROUNDWORK_CONFIG
  const path = explicit ? resolve(cwd, explicit) : join(cwd, CONFIG_FILE_NAME)

  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error: unknown) {
    if (!explicit && (error as NodeJS.ErrnoException).code === 'ENOENT') {
      return parseConfig({}, env)
    }

    throw new ConfigError(`Cannot read config file ${path}`, {cause: error})
  }

  let raw: unknown
  try {
    raw = parseYaml(content) as unknown
  } catch (error: unknown) {
    throw new ConfigError(`Invalid YAML in ${path}`, {cause: error})
  }

  return parseConfig(raw ?? {}, env)
}

/**
 * Validates raw configuration and resolves it against the environment.
 * @throws ConfigError listing every invalid path
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): GroundworkConfig {
  const parsed = ConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, {cause: parsed.error})
  }

  const {bootstrap, backend} = parsed.data
  const home = env.GROUNDWORK_HOME ?? parsed.data.home ?? homedir()
  const expand = (path: string) => expandHome(path, home)

  return {
    home,
    bootstrap: {
      ...bootstrap,
      sshKey: {...bootstrap.sshKey, path: expand(bootstrap.sshKey.path), copyPath: expand(bootstrap.sshKey.copyPath)},
      publicIp: {...bootstrap.publicIp, file: expand(bootstrap.publicIp.file)}
    },
    backend: {
      ...backend,
      region: env.AWS_REGION ?? backend.region,
      vault: {
        ...backend.vault,
        logFile: expand(backend.vault.logFile),
        tokenFile: expand(backend.vault.tokenFile),
        pidFile: expand(backend.vault.pidFile)
      }
    }
  }
}
