export class AgentError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The initialize exchange failed. Fatal for the owning client. */
export class HandshakeError extends AgentError {}

export type RequestErrorKind = 'timeout' | 'transport' | 'decode' | 'remote';

export interface RequestErrorDetails {
  status?: number;
  code?: number;
}

export class RequestError extends AgentError {
  readonly kind: RequestErrorKind;
  readonly status?: number;
  /** JSON-RPC error code, for `remote` errors. */
  readonly code?: number;

  constructor(kind: RequestErrorKind, message: string, details: RequestErrorDetails = {}, options?: ErrorOptions) {
    super(message, options);
    this.kind = kind;
    this.status = details.status;
    this.code = details.code;
  }
}

/** A record that could not be decoded. Returned as a value, not thrown. */
export class DecodeError extends AgentError {
  readonly raw: string;

  constructor(message: string, raw: string, options?: ErrorOptions) {
    super(message, options);
    this.raw = raw;
  }
}

/** The client was used before the handshake or after close. */
export class SessionStateError extends AgentError {}

export class CompletionEndpointError extends AgentError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super(message, options);
    this.status = status;
  }
}

export class ConfigError extends AgentError {}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
