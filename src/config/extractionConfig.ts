import { isLogLevel, type LogLevel } from '../shared/utils/logging.ts';
import { isFrameFormat, type FrameFormat } from '../types/volume.ts';

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';
export const DEFAULT_FRAME_FORMAT: FrameFormat = 'tiff';

export type ExtractionConfig = {
  logLevel: LogLevel;
  format: FrameFormat;
};

type EnvironmentSource = Record<string, string | undefined>;

const readLogLevel = (env: EnvironmentSource): LogLevel | null => {
  const raw = env.VOLUME_FRAMES_LOG_LEVEL?.trim().toLowerCase();
  if (!raw) {
    return null;
  }
  if (!isLogLevel(raw)) {
    console.warn(`Invalid VOLUME_FRAMES_LOG_LEVEL value "${raw}"; falling back to "${DEFAULT_LOG_LEVEL}".`);
    return null;
  }
  return raw;
};

const readFrameFormat = (env: EnvironmentSource): FrameFormat | null => {
  const raw = env.VOLUME_FRAMES_FORMAT?.trim().toLowerCase();
  if (!raw) {
    return null;
  }
  if (!isFrameFormat(raw)) {
    console.warn(`Invalid VOLUME_FRAMES_FORMAT value "${raw}"; falling back to "${DEFAULT_FRAME_FORMAT}".`);
    return null;
  }
  return raw;
};

export function resolveExtractionConfig(env: EnvironmentSource = process.env): ExtractionConfig {
  return {
    logLevel: readLogLevel(env) ?? DEFAULT_LOG_LEVEL,
    format: readFrameFormat(env) ?? DEFAULT_FRAME_FORMAT
  };
}
