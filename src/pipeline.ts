
import { ColorConfig } from './color';
import { Config } from './config';
import { extractRecord } from './extractor';
import { passesMinLevel } from './level';
import { OutputSink } from './output';
import { parseLine } from './parser';
import { renderRecord } from './render';
import { sanitize } from './sanitize';
import { fieldMapping, schemaFromChoice } from './schema';
import { LineSource } from './sources';
import { createRenderContext, parseTemplate } from './template';
import { ResolvedZone, resolveTimeZone } from './timestamp';
import { FormatToken, Level, NonJsonMode, RenderContext, RenderOptions, SchemaChoice, SchemaName, TsFormat } from './types';

/** Everything a line needs that is worked out once per run. */
export interface Runtime {
  tokens: readonly FormatToken[];
  colors: ColorConfig;
  options: RenderOptions;
  context: RenderContext;
  zone: ResolvedZone;
  tsFormat: TsFormat;
  schema: SchemaChoice;
  nonJson: NonJsonMode;
  minLevel?: Level;
}

/** Throws `TimezoneError` here, before any input is read, when `tz` is unknown. */
export function createRuntime(config: Config, colors: ColorConfig): Runtime {
  const tokens = parseTemplate(config.format);
  return {
    tokens,
    colors,
    options: config,
    context: createRenderContext(config, tokens),
    zone: resolveTimeZone(config.tz),
    tsFormat: config.tsFormat,
    schema: config.schema,
    nonJson: config.nonJson,
    minLevel: config.minLevel,
  };
}

/**
 * Pumps one source into the sink, a line at a time. The schema is fixed by
 * the first JSON line of the source.
 */
export async function processSource(source: LineSource, sink: OutputSink, runtime: Runtime): Promise<void> {
  let schema: SchemaName | undefined;
  for (;;) {
    const line = await source.nextLine();
    if (line === null) return;

    const parsed = parseLine(line, runtime.nonJson);
    if (parsed.kind === 'skip') continue;
    if (parsed.kind === 'text') {
      await sink.writeLine(sanitize(parsed.text));
      continue;
    }

    schema ??= schemaFromChoice(runtime.schema, parsed.value);
    const record = extractRecord(parsed.value, fieldMapping(schema), runtime.zone, runtime.tsFormat);
    record.rawText = line;
    if (!passesMinLevel(record.level, runtime.minLevel)) continue;
    await sink.writeLine(renderRecord(record, runtime.tokens, runtime.colors, runtime.options, runtime.context));
  }
}

export type SourcePlan = { kind: 'stdin' } | { kind: 'file'; path: string } | { kind: 'follow'; path: string };

/** Files in argument order; with `follow` the last one is tailed. No files means stdin. */
export function planSources(files: readonly string[], follow: boolean): SourcePlan[] {
  if (files.length === 0) return [{ kind: 'stdin' }];
  return files.map((path, i): SourcePlan =>
    follow && i === files.length - 1 ? { kind: 'follow', path } : { kind: 'file', path },
  );
}

export interface SourceOpeners {
  stdin(): LineSource;
  file(path: string): Promise<LineSource>;
  follow(path: string): Promise<LineSource>;
}

function openSource(plan: SourcePlan, open: SourceOpeners): Promise<LineSource> {
  switch (plan.kind) {
    case 'stdin':
      return Promise.resolve(open.stdin());
    case 'file':
      return open.file(plan.path);
    case 'follow':
      return open.follow(plan.path);
  }
}

/**
 * Runs every planned source to completion, strictly in order. Each source is
 * opened only when its turn comes and closed before the next one.
 */
export async function runPipeline(
  config: Pick<Config, 'files' | 'follow'>,
  runtime: Runtime,
  sink: OutputSink,
  open: SourceOpeners,
): Promise<void> {
  for (const plan of planSources(config.files, config.follow)) {
    const source = await openSource(plan, open);
    try {
      await processSource(source, sink, runtime);
    } finally {
      await source.close();
    }
  }
}
