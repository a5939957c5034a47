
import { z } from 'zod';
import { ConfigError } from './errors';
import { parseLevelName } from './level';
import { DEFAULT_TEMPLATE, parseFieldList } from './template';

/** Settings before validation, as they come from the environment or the command line. */
export interface RawConfig {
  format?: string;
  addFields?: string;
  omitFields?: string;
  color?: string;
  nonJson?: string;
  schema?: string;
  loggerFormat?: string;
  loggerLength?: string;
  tsFormat?: string;
  minLevel?: string;
  rawJson?: boolean;
  expanded?: boolean;
  keyColor?: string;
  valueColor?: string;
  tz?: string;
  follow?: boolean;
  output?: string;
  files?: string[];
}

const COLOR_NAMES = ['black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white'] as const;

const LevelSchema = z.string().transform((value, ctx) => {
  const level = parseLevelName(value);
  if (!level) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown log level: ${value}` });
    return z.NEVER;
  }
  return level;
});

export const ConfigSchema = z
  .object({
    format: z.string().default(DEFAULT_TEMPLATE),
    addFields: z.string().optional().transform(parseFieldList),
    omitFields: z.string().optional().transform(parseFieldList),
    color: z.enum(['auto', 'always', 'never']).default('auto'),
    nonJson: z.enum(['print-as-is', 'skip', 'fail']).default('print-as-is'),
    schema: z.enum(['auto', 'logstash', 'logrus', 'bunyan', 'generic']).default('auto'),
    loggerFormat: z.enum(['short-dots', 'as-is']).default('short-dots'),
    loggerLength: z
      .string()
      .regex(/^\d+$/, 'must be a non-negative integer')
      .optional()
      .transform((v) => (v === undefined ? 30 : Number(v))),
    tsFormat: z.enum(['time', 'full']).default('time'),
    minLevel: LevelSchema.optional(),
    rawJson: z.boolean().default(false),
    expanded: z.boolean().default(false),
    keyColor: z.enum(COLOR_NAMES).default('magenta'),
    valueColor: z.enum(COLOR_NAMES).default('cyan'),
    tz: z.string().min(1).default('local'),
    follow: z.boolean().default(false),
    output: z.string().min(1).optional(),
    files: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type Config = Readonly<z.infer<typeof ConfigSchema>>;

type StringSetting = {
  [K in keyof RawConfig]-?: RawConfig[K] extends string | undefined ? K : never;
}[keyof RawConfig];

const ENV_KEYS: Record<string, StringSetting> = {
  LOGPRISM_FORMAT: 'format',
  LOGPRISM_ADD_FIELDS: 'addFields',
  LOGPRISM_OMIT_FIELDS: 'omitFields',
  LOGPRISM_COLOR: 'color',
  LOGPRISM_NON_JSON: 'nonJson',
  LOGPRISM_SCHEMA: 'schema',
  LOGPRISM_LOGGER_FORMAT: 'loggerFormat',
  LOGPRISM_LOGGER_LENGTH: 'loggerLength',
  LOGPRISM_TS_FORMAT: 'tsFormat',
  LOGPRISM_MIN_LEVEL: 'minLevel',
  LOGPRISM_KEY_COLOR: 'keyColor',
  LOGPRISM_VALUE_COLOR: 'valueColor',
  LOGPRISM_TZ: 'tz',
};

/** String-valued settings from `LOGPRISM_*` variables; empty values are ignored. */
export function configFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value) raw[key] = value;
  }
  return raw;
}

/**
 * Merges defaults, environment and command line (later wins), validates the
 * result and returns it frozen. Keys of `cli` that are present override the
 * environment, so leave unset options out rather than passing undefined.
 */
export function loadConfig(cli: RawConfig, env: NodeJS.ProcessEnv = process.env): Config {
  const fromEnv = configFromEnv(env);
  // The two lists are one setting: either one on the command line replaces both from the environment
  if (cli.addFields !== undefined || cli.omitFields !== undefined) {
    delete fromEnv.addFields;
    delete fromEnv.omitFields;
  }
  const raw: RawConfig = { ...fromEnv, ...cli };
  if (raw.addFields !== undefined && raw.omitFields !== undefined) {
    throw new ConfigError('add-fields and omit-fields cannot be used together');
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(`${where}${issue.message}`);
  }
  const config = result.data;
  Object.freeze(config.addFields);
  Object.freeze(config.omitFields);
  Object.freeze(config.files);
  return Object.freeze(config);
}
