/**
 * Error types thrown by the toolbox.
 *
 * `ValidationError` messages are written for the person answering the
 * interview and may be shown next to the field as-is. `InvalidInputError`
 * signals a programming mistake: an argument the helper cannot work with.
 */

export class ToolboxError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class ValidationError extends ToolboxError {}

export class InvalidInputError extends ToolboxError {
  constructor(
    message: string,
    readonly received?: unknown,
  ) {
    super(message)
  }
}
