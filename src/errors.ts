export class GroundworkError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'GroundworkError'
  }
}

// -- Command errors ----------------------------------------------------------

export class CommandError extends GroundworkError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'CommandError'
  }
}

export class CommandFailedError extends CommandError {
  constructor(
    readonly command: string,
    readonly exitCode: number,
    options?: {cause?: unknown}
  ) {
    super('COMMAND_FAILED', `Command "${command}" failed with exit code ${exitCode}`, options)
    this.name = 'CommandFailedError'
  }
}

export class CommandLaunchError extends CommandError {
  constructor(readonly command: string, options?: {cause?: unknown}) {
    super('COMMAND_LAUNCH_FAILED', `Command "${command}" could not be started`, options)
    this.name = 'CommandLaunchError'
  }
}

export class CommandTimeoutError extends CommandError {
  constructor(readonly command: string, timeoutMs: number, options?: {cause?: unknown}) {
    super('COMMAND_TIMEOUT', `Command "${command}" exceeded timeout of ${timeoutMs}ms`, options)
    this.name = 'CommandTimeoutError'
  }
}

// -- Step errors -------------------------------------------------------------

export class StepError extends GroundworkError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'StepError'
  }
}

export class PostconditionError extends StepError {
  constructor(readonly stepId: string, options?: {cause?: unknown}) {
    super('POSTCONDITION_FAILED', `Step ${stepId}: postcondition not met after action`, options)
    this.name = 'PostconditionError'
  }
}

export class PollExhaustedError extends StepError {
  constructor(
    readonly target: string,
    readonly attempts: number,
    options?: {cause?: unknown}
  ) {
    super('POLL_EXHAUSTED', `Gave up waiting for ${target} after ${attempts} attempts`, options)
    this.name = 'PollExhaustedError'
  }
}

// -- Network errors ----------------------------------------------------------

export class NetworkError extends GroundworkError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'NetworkError'
  }
}

export class InvalidPublicIpError extends NetworkError {
  constructor(readonly value: string, options?: {cause?: unknown}) {
    super('INVALID_PUBLIC_IP', `IP echo service returned an invalid address: "${value}"`, options)
    this.name = 'InvalidPublicIpError'
  }
}

export class HttpError extends NetworkError {
  constructor(
    readonly url: string,
    readonly status: number,
    options?: {cause?: unknown}
  ) {
    super('HTTP_ERROR', `GET ${url} responded with status ${status}`, options)
    this.name = 'HttpError'
  }
}

// -- Dev server errors -------------------------------------------------------

export class DevServerError extends GroundworkError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'DevServerError'
  }
}

export class DevServerExitedError extends DevServerError {
  constructor(readonly exitCode: number | undefined, options?: {cause?: unknown}) {
    super('DEV_SERVER_EXITED', `Dev server exited before becoming ready (exit code ${exitCode ?? 'unknown'})`, options)
    this.name = 'DevServerExitedError'
  }
}

export class DevServerNotReadyError extends DevServerError {
  constructor(readonly attempts: number, options?: {cause?: unknown}) {
    super('DEV_SERVER_NOT_READY', `Dev server did not become ready after ${attempts} health checks`, options)
    this.name = 'DevServerNotReadyError'
  }
}

export class CredentialNotFoundError extends DevServerError {
  constructor(readonly logFile: string, options?: {cause?: unknown}) {
    super('CREDENTIAL_NOT_FOUND', `No root token found in ${logFile}`, options)
    this.name = 'CredentialNotFoundError'
  }
}

// -- Cloud errors ------------------------------------------------------------

export class CloudError extends GroundworkError {
  constructor(readonly operation: string, options?: {cause?: unknown}) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : ''
    super('CLOUD_REQUEST_FAILED', `${operation} failed${detail}`, options)
    this.name = 'CloudError'
  }
}

// -- Config errors -----------------------------------------------------------

export class ConfigError extends GroundworkError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_CONFIG', message, options)
    this.name = 'ConfigError'
  }
}
