import { Command, InvalidArgumentError } from 'commander';

import { resolveExtractionConfig, type ExtractionConfig } from '../config/extractionConfig.ts';
import { runExtraction, type ExtractionSummary, type FrameOutput, type RunExtractionOptions } from '../extraction/extractFrames.ts';
import { createConsoleLogger, logLevelFromVerbosity, type Logger } from '../shared/utils/logging.ts';
import { isFrameFormat, type FrameFormat, type RasterChannels } from '../types/volume.ts';

export type CliOptions = {
  verbose: number;
  metadata: string;
  data: string;
  xfile?: string;
  yfile?: string;
  zfile?: string;
  xIndex?: number;
  yIndex?: number;
  zIndex?: number;
  format?: FrameFormat;
  rgb?: boolean;
};

export type ProgramDependencies = {
  config?: ExtractionConfig;
  run?: (options: RunExtractionOptions) => Promise<ExtractionSummary>;
  createLogger?: (options: CliOptions, config: ExtractionConfig) => Logger;
};

const increaseVerbosity = (_value: string, previous: number) => previous + 1;

const parseFrameIndex = (value: string): number => {
  if (!/^[0-9]+$/.test(value.trim())) {
    throw new InvalidArgumentError('Frame index must be a non-negative integer.');
  }
  return Number.parseInt(value, 10);
};

const parseFormat = (value: string): FrameFormat => {
  const normalized = value.trim().toLowerCase();
  if (!isFrameFormat(normalized)) {
    throw new InvalidArgumentError('Format must be "tiff" or "raw".');
  }
  return normalized;
};

const defaultCreateLogger = (options: CliOptions, config: ExtractionConfig): Logger =>
  createConsoleLogger(options.verbose > 0 ? logLevelFromVerbosity(options.verbose) : config.logLevel);

export function toFrameOutputs(options: CliOptions): FrameOutput[] {
  const outputs: FrameOutput[] = [];
  if (options.xfile) {
    outputs.push({ axis: 'x', index: options.xIndex, outputPath: options.xfile });
  }
  if (options.yfile) {
    outputs.push({ axis: 'y', index: options.yIndex, outputPath: options.yfile });
  }
  if (options.zfile) {
    outputs.push({ axis: 'z', index: options.zIndex, outputPath: options.zfile });
  }
  return outputs;
}

export function createProgram({
  config = resolveExtractionConfig(),
  run = runExtraction,
  createLogger = defaultCreateLogger
}: ProgramDependencies = {}): Command {
  const program = new Command();

  program
    .name('volume-frames')
    .description('Extract 2D frames from 16-bit volumetric data.')
    .option('-v, --verbose', 'verbose output (can be specified multiple times)', increaseVerbosity, 0)
    .requiredOption('-m, --metadata <metadata-file>', 'input: metadata file')
    .requiredOption('-d, --data <data-file>', 'input: volumetric data file')
    .option('-x, --xfile <x-frame-file>', 'output: X frame file')
    .option('-y, --yfile <y-frame-file>', 'output: Y frame file')
    .option('-z, --zfile <z-frame-file>', 'output: Z frame file')
    .option('--x-index <index>', 'X frame index (defaults to the middle frame)', parseFrameIndex)
    .option('--y-index <index>', 'Y frame index (defaults to the middle frame)', parseFrameIndex)
    .option('--z-index <index>', 'Z frame index (defaults to the middle frame)', parseFrameIndex)
    .option('-f, --format <format>', 'output format: tiff or raw', parseFormat)
    .option('--rgb', 'write 3-channel TIFF frames instead of grayscale')
    .action(async () => {
      const options = program.opts<CliOptions>();
      const outputs = toFrameOutputs(options);
      if (outputs.length === 0) {
        program.error('error: at least one of --xfile, --yfile or --zfile is required');
      }

      const log = createLogger(options, config);
      log.info('Informational output enabled.');
      log.debug('Debug output enabled.');
      log.trace('Tracing output enabled.');

      const channels: RasterChannels = options.rgb ? 3 : 1;
      await run({
        metadataPath: options.metadata,
        dataPath: options.data,
        outputs,
        format: options.format ?? config.format,
        channels,
        log
      });
    });

  return program;
}
