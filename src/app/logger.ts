import * as core from "@actions/core";

export interface FlowLogger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  group<T>(name: string, fn: () => Promise<T>): Promise<T>;
}

export const actionsLogger: FlowLogger = {
  info: (message) => core.info(message),
  warning: (message) => core.warning(message),
  error: (message) => core.error(message),
  group: <T>(name: string, fn: () => Promise<T>) => core.group(name, fn),
};

export function createDebugLogger(enabled: boolean, logger: FlowLogger = actionsLogger): (message: string) => void {
  return (message) => {
    if (enabled) {
      logger.info(message);
    }
  };
}
