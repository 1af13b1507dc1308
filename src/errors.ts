import { z } from 'zod';

/** Base class for every error this adapter throws */
export class DnsAdapterError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Record or zone input rejected before any network call */
export class ValidationError extends DnsAdapterError {}

/** The zone is not hosted under the configured credential */
export class ZoneNotFoundError extends DnsAdapterError {
  constructor(readonly domain: string) {
    super(`Linode: no zone found for domain "${domain}"`);
  }
}

/** No provider identifier could be resolved for a record */
export class RecordNotFoundError extends DnsAdapterError {}

/**
 * Raised by the codec for a type outside its switch. The permitted-type check
 * runs first, so reaching this is a programming error.
 */
export class UnsupportedRecordTypeError extends DnsAdapterError {
  constructor(readonly type: string) {
    super(`Unsupported DNS RR type \`${type}'`);
  }
}

/** A Linode API call failed, either on the wire or with a non-2xx status */
export class RequestError extends DnsAdapterError {
  constructor(
    readonly status: number,
    readonly body: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/** A mutation was refused by the provider */
export class ProviderError extends DnsAdapterError {
  readonly status: number;

  constructor(message: string, cause: RequestError) {
    super(`${message}: ${renderMessage(cause)}`, { cause });
    this.status = cause.status;
  }
}

const linodeErrorBody = z.object({
  errors: z.array(z.object({ reason: z.string().min(1) })).nonempty(),
});

/**
 * Pull the provider's first stated reason out of a failed response, falling
 * back to the transport message.
 */
export function renderMessage(
  err: RequestError,
  fallback: string = err.message
): string {
  let body: unknown;
  try {
    body = JSON.parse(err.body);
  } catch {
    return fallback;
  }

  const parsed = linodeErrorBody.safeParse(body);
  return parsed.success ? parsed.data.errors[0].reason : fallback;
}
