#!/usr/bin/env node
import { parseCommandLine, USAGE } from './cli';
import { ColorConfig } from './color';
import { loadConfig } from './config';
import { isBrokenPipe, LogprismError } from './errors';
import { FollowSource } from './fileFollower';
import { logger } from './logger';
import { FileSink, OutputSink, StdoutSink } from './output';
import { createRuntime, runPipeline } from './pipeline';
import { abortOnSignals } from './signals';
import { FileSource, StdinSource } from './sources';

async function main(argv: string[]): Promise<void> {
  const { help, settings } = parseCommandLine(argv);
  if (help) {
    process.stdout.write(USAGE);
    return;
  }

  const config = loadConfig(settings);
  const colors = ColorConfig.fromSettings(
    { mode: config.color, keyColor: config.keyColor, valueColor: config.valueColor },
    process.stdout.isTTY === true,
    config.output !== undefined,
  );
  // Resolves the timezone, so a bad --tz fails before the output file is truncated
  const runtime = createRuntime(config, colors);
  const sink: OutputSink = config.output ? await FileSink.create(config.output) : new StdoutSink();

  const controller = new AbortController();
  abortOnSignals(config.follow, controller);

  try {
    await runPipeline(config, runtime, sink, {
      stdin: () => new StdinSource(),
      file: (path) => FileSource.open(path),
      follow: async (path) => {
        const follower = await FollowSource.open(path, { signal: controller.signal });
        follower.on('notice', (msg) => logger.debug(msg));
        follower.on('warning', (msg) => logger.warn(msg));
        return follower;
      },
    });
  } finally {
    await sink.close();
  }
}

// `logprism app.log | head` closes our stdout early; that is a normal way to stop
process.stdout.on('error', (err) => {
  if (isBrokenPipe(err)) process.exit(0);
});

main(process.argv.slice(2)).catch((err: unknown) => {
  if (isBrokenPipe(err)) process.exit(0);
  if (err instanceof LogprismError) {
    logger.fatal(err.toLogObject(), err.message);
  } else {
    logger.fatal({ err }, err instanceof Error ? err.message : String(err));
  }
  process.exitCode = 1;
});
