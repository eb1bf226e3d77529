export type Logger = (message: string) => void;

export const silentLogger: Logger = () => {};

export function createLogger(scope: string, enabled: boolean): Logger {
  if (!enabled) return silentLogger;
  return (message) => {
    process.stderr.write(`[${scope}] ${message}\n`);
  };
}
