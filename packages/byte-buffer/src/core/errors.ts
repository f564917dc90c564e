import { BaseError, type ErrorContext } from "@wirebuf/errors"
import { type ZodError, z } from "zod"

/**
 * A read, string scan or bit read ran past the bytes currently available.
 * The message being decoded is truncated or lies about its own length.
 */
export class PositionError extends BaseError<"buffer_position"> {
  readonly position: number
  readonly size: number
  readonly valueSize: number

  constructor(position: number, size: number, valueSize: number) {
    super(
      `Attempted to get value with size: ${valueSize} in byte buffer (pos: ${position} size: ${size})`,
      {
        code: "buffer_position",
        context: { position, size, valueSize },
      },
    )

    this.position = position
    this.size = size
    this.valueSize = valueSize
  }
}

export type InvalidValueType = "float" | "double" | "string"

/**
 * The bytes were there but decode to a value the protocol never carries:
 * a non-finite float, or text that is not UTF-8.
 */
export class InvalidValueError extends BaseError<"buffer_invalid_value"> {
  readonly type: InvalidValueType
  readonly value: string

  constructor(type: InvalidValueType, value: string, cause?: unknown) {
    super(`Invalid ${type} value (${value}) found in byte buffer`, {
      code: "buffer_invalid_value",
      context: { type, value },
      cause,
    })

    this.type = type
    this.value = value
  }
}

/**
 * A precondition on the calling code was broken (zero-sized append, patch
 * outside written bytes, runaway growth). Not caused by peer input.
 */
export class BufferAssertionError extends BaseError<"buffer_assertion"> {
  constructor(message: string, context?: ErrorContext) {
    super(message, {
      code: "buffer_assertion",
      context,
      isOperational: false,
    })
  }
}

export function assertBuffer(
  condition: boolean,
  message: string,
  context?: ErrorContext,
): asserts condition {
  if (!condition) {
    throw new BufferAssertionError(message, context)
  }
}

export type OptionsIssue = { path: string; message: string }

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

export class InvalidOptionsError extends BaseError<"invalid_options"> {
  readonly issues: readonly OptionsIssue[]

  constructor(message: string, issues: readonly OptionsIssue[]) {
    super(message, {
      code: "invalid_options",
      context: { issues },
      isOperational: false,
    })

    this.issues = issues
  }

  static fromZodError(err: ZodError): InvalidOptionsError {
    const issues = err.issues.map((i) => ({
      path: formatPath(i.path),
      message: i.message,
    }))

    return new InvalidOptionsError(
      `Byte buffer options validation failed:\n${z.prettifyError(err)}`,
      issues,
    )
  }
}
