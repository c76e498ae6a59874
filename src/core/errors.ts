// Sky error types.
// 天空错误类型

export type SkyErrorCode = "INVALID_ARGUMENT" | "ILLEGAL_STATE" | "CONFIGURATION_OVERFLOW";

/**
 * Base error for the sky engine. `component` is the tag used in the message prefix.
 * 天空引擎的基础错误。`component` 是消息前缀中使用的标签
 */
export class SkyError extends Error {
  readonly code: SkyErrorCode;
  readonly component: string;

  constructor(code: SkyErrorCode, component: string, message: string, options?: { cause?: unknown }) {
    super(`[${component}] ${message}`, options);
    this.name = "SkyError";
    this.code = code;
    this.component = component;
  }
}

/**
 * A value outside its documented range.
 * 值超出其文档范围
 */
export class InvalidArgumentError extends SkyError {
  constructor(component: string, message: string, options?: { cause?: unknown }) {
    super("INVALID_ARGUMENT", component, message, options);
    this.name = "InvalidArgumentError";
  }
}

/**
 * An operation called in a state that does not allow it.
 * 在不允许的状态下调用操作
 */
export class IllegalStateError extends SkyError {
  constructor(component: string, message: string, options?: { cause?: unknown }) {
    super("ILLEGAL_STATE", component, message, options);
    this.name = "IllegalStateError";
  }
}

/**
 * Requested object/cloud-layer counts exceed every supported material shape.
 * 请求的天体/云层数量超过所有支持的材质形态
 */
export class ConfigurationOverflowError extends SkyError {
  constructor(component: string, message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION_OVERFLOW", component, message, options);
    this.name = "ConfigurationOverflowError";
  }
}

/**
 * Exhaustiveness helper for `switch` statements.
 * `switch` 语句的穷尽性检查辅助函数
 */
export function assertNever(value: never, message = "Unexpected value"): never {
  throw new Error(`${message}: ${String(value)}`);
}
