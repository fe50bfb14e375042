export type Logger = (message: string) => void;

export function scopedLogger(logger: Logger | undefined, scope: string): Logger | undefined {
  if (!logger) {
    return undefined;
  }
  return (message) => logger(`[${scope}] ${message}`);
}
