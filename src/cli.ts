
import { parseArgs } from 'util';
import { RawConfig } from './config';
import { ConfigError } from './errors';

export const USAGE = `Usage: logprism [options] [file ...]

Pretty-prints JSON log lines from the given files, or stdin when none are given.

Options:
  -f, --format <template>     output template (default "{timestamp} {level} [{logger}] {message}")
      --add-fields <list>     comma-separated extra fields to show
      --omit-fields <list>    show all extra fields except these
      --color <mode>          auto | always | never
      --non-json <mode>       print-as-is | skip | fail
      --schema <name>         auto | logstash | logrus | bunyan | generic
      --logger-format <fmt>   short-dots | as-is
      --logger-length <n>     crop logger names to n characters (0 = no limit, default 30)
      --ts-format <style>     time | full
      --min-level <level>     hide records below this level
      --raw-json              print the original JSON
      --expanded              one extra field per line
      --key-color <color>     color of extra field keys (default magenta)
      --value-color <color>   color of extra field values (default cyan)
      --tz <zone>             local | utc | IANA name (default local)
      --follow                keep reading the last file as it grows
  -o, --output <file>         write to a file instead of stdout
  -h, --help                  show this help
`;

const OPTIONS = {
  format: { type: 'string', short: 'f' },
  'add-fields': { type: 'string' },
  'omit-fields': { type: 'string' },
  color: { type: 'string' },
  'non-json': { type: 'string' },
  schema: { type: 'string' },
  'logger-format': { type: 'string' },
  'logger-length': { type: 'string' },
  'ts-format': { type: 'string' },
  'min-level': { type: 'string' },
  'raw-json': { type: 'boolean' },
  expanded: { type: 'boolean' },
  'key-color': { type: 'string' },
  'value-color': { type: 'string' },
  tz: { type: 'string' },
  follow: { type: 'boolean' },
  output: { type: 'string', short: 'o' },
  help: { type: 'boolean', short: 'h' },
} as const;

export interface CommandLine {
  help: boolean;
  settings: RawConfig;
}

function parse(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (e: unknown) {
    // unknown option, missing value, ...
    throw new ConfigError(e instanceof Error ? e.message : String(e));
  }
}

/** Options that were not given are left out of `settings` so the environment can supply them. */
export function parseCommandLine(argv: string[]): CommandLine {
  const { values, positionals } = parse(argv);

  const settings: RawConfig = {};
  const set = <K extends keyof RawConfig>(key: K, value: RawConfig[K]) => {
    if (value !== undefined) settings[key] = value;
  };
  set('format', values.format);
  set('addFields', values['add-fields']);
  set('omitFields', values['omit-fields']);
  set('color', values.color);
  set('nonJson', values['non-json']);
  set('schema', values.schema);
  set('loggerFormat', values['logger-format']);
  set('loggerLength', values['logger-length']);
  set('tsFormat', values['ts-format']);
  set('minLevel', values['min-level']);
  set('rawJson', values['raw-json']);
  set('expanded', values.expanded);
  set('keyColor', values['key-color']);
  set('valueColor', values['value-color']);
  set('tz', values.tz);
  set('follow', values.follow);
  set('output', values.output);
  if (positionals.length > 0) settings.files = positionals;

  return { help: values.help === true, settings };
}
