export class CourseMateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CourseMateError";
  }
}

export class ConfigurationError extends CourseMateError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class RetrievalError extends CourseMateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RetrievalError";
  }
}

export class ToolInvocationError extends CourseMateError {
  constructor(
    readonly toolName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ToolInvocationError";
  }
}

export class ToolNotFoundError extends ToolInvocationError {
  constructor(toolName: string) {
    super(toolName, `Unknown tool: ${toolName}`);
    this.name = "ToolNotFoundError";
  }
}

export type BackendErrorKind =
  | "authentication"
  | "insufficient_credits"
  | "rate_limited"
  | "timeout"
  | "server_error"
  | "unavailable"
  | "malformed_response"
  | "unknown";

const userMessages: Record<BackendErrorKind, string> = {
  authentication: "The language model provider rejected the configured credentials.",
  insufficient_credits: "The language model account has insufficient credits.",
  rate_limited: "The language model provider is rate limiting requests. Please retry shortly.",
  timeout: "The language model did not respond in time. Please retry.",
  server_error: "The language model provider had a transient server error. Please retry.",
  unavailable: "The language model provider could not be reached.",
  malformed_response: "The language model returned a response that could not be read.",
  unknown: "The call to the language model failed."
};

export class BackendError extends CourseMateError {
  readonly kind: BackendErrorKind;
  readonly provider: string;
  readonly status: number | undefined;

  constructor(
    input: { kind: BackendErrorKind; provider: string; status?: number; detail?: string },
    options?: { cause?: unknown }
  ) {
    super(
      `${input.provider} backend error (${input.kind})${input.detail ? `: ${input.detail}` : ""}`,
      options
    );
    this.name = "BackendError";
    this.kind = input.kind;
    this.provider = input.provider;
    this.status = input.status;
  }

  get userMessage(): string {
    return userMessages[this.kind];
  }
}

interface ProviderErrorShape {
  status?: number;
  code?: string;
  name?: string;
  message?: string;
  providerType?: string;
  providerMessage?: string;
}

const creditPattern = /credit balance|insufficient[_ ](?:quota|credits?|funds)|billing|payment required/i;
const timeoutPattern = /timeout|timed out/i;
const connectionCodes = ["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN", "ECONNABORTED"];

/**
 * Maps an error thrown by a provider SDK (or the rate limiter around it) to a
 * BackendError. Both SDKs expose `status` plus a parsed `error` body; the
 * body's message is kept for logs only.
 */
export function classifyBackendError(provider: string, error: unknown): BackendError {
  if (error instanceof BackendError) {
    return error;
  }

  const shape = readErrorShape(error);
  const detail = shape.providerMessage ?? shape.message;
  const build = (kind: BackendErrorKind): BackendError => {
    const input: { kind: BackendErrorKind; provider: string; status?: number; detail?: string } = {
      kind,
      provider
    };
    if (shape.status !== undefined) {
      input.status = shape.status;
    }
    if (detail !== undefined) {
      input.detail = detail;
    }
    return new BackendError(input, { cause: error });
  };

  const creditHint = [shape.code, shape.providerType, detail]
    .filter((part): part is string => typeof part === "string")
    .some((part) => creditPattern.test(part));

  if (shape.status === 402 || creditHint) {
    return build("insufficient_credits");
  }
  if (shape.status === 401 || shape.status === 403) {
    return build("authentication");
  }
  if (shape.status === 429) {
    return build("rate_limited");
  }
  if (shape.status === 408 || shape.name === "APIConnectionTimeoutError") {
    return build("timeout");
  }
  if (shape.status !== undefined && shape.status >= 500) {
    return build("server_error");
  }
  if (
    shape.name === "APIConnectionError" ||
    (shape.code !== undefined && connectionCodes.includes(shape.code))
  ) {
    return build("unavailable");
  }
  if (shape.message !== undefined && timeoutPattern.test(shape.message)) {
    return build("timeout");
  }
  return build("unknown");
}

function readErrorShape(error: unknown): ProviderErrorShape {
  const shape: ProviderErrorShape = {};
  if (!isRecord(error)) {
    return shape;
  }

  if (typeof error.status === "number") {
    shape.status = error.status;
  }
  if (typeof error.code === "string") {
    shape.code = error.code;
  }
  if (typeof error.name === "string") {
    shape.name = error.name;
  }
  if (typeof error.message === "string") {
    shape.message = error.message;
  }

  // Anthropic: { type: "error", error: { type, message } }; OpenAI: { message, type, code }
  const body = isRecord(error.error) ? error.error : null;
  const inner = body && isRecord(body.error) ? body.error : body;
  if (inner) {
    if (typeof inner.type === "string") {
      shape.providerType = inner.type;
    }
    if (typeof inner.message === "string") {
      shape.providerMessage = inner.message;
    }
    if (shape.code === undefined && typeof inner.code === "string") {
      shape.code = inner.code;
    }
  }

  return shape;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
