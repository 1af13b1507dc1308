import { createLinodeApi } from './api.js';
import { RequestError, renderMessage } from './errors.js';
import { createChildLogger } from './logger.js';

export interface KeyValidation {
  valid: boolean;
  /** Why the key was refused */
  reason?: string;
}

/**
 * Check a Linode API key before storing it.
 *
 * The key must be hexadecimal and must authenticate a `GET account`.
 */
export async function validateLinodeKey(
  key: string,
  baseUrl?: string
): Promise<KeyValidation> {
  if (!/^[0-9a-f]+$/i.test(key)) {
    return { valid: false, reason: 'key must be hexadecimal' };
  }

  try {
    await createLinodeApi({ apiToken: key, baseUrl }).do('GET', 'account');
  } catch (err) {
    if (!(err instanceof RequestError)) throw err;
    const reason = renderMessage(err, 'Invalid key');
    createChildLogger({ component: 'validator' }).warn(
      { status: err.status },
      `Linode key failed: ${reason}`
    );
    return { valid: false, reason };
  }

  return { valid: true };
}
