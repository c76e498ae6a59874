// Logging: injected logger with "[Component] message" tags.
// 日志：注入式日志器，使用 "[Component] message" 标签

export interface SkyLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/** Console-backed logger. / 基于控制台的日志器 */
export const consoleLogger: SkyLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message, error) => {
    if (error === undefined) {
      console.error(message);
    } else {
      console.error(message, error);
    }
  },
};

/** Logger that discards everything (tests, headless hosts). / 丢弃所有输出的日志器（测试、无头宿主） */
export const silentLogger: SkyLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
