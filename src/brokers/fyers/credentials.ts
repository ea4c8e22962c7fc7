import { StaleCredentialError } from '../../core/errors.js';

/**
 * The push sockets take `client_id:access_token`. Issuing and refreshing the
 * token happens elsewhere; this only composes what configuration supplies.
 */
export function streamCredential(clientId: string | undefined, accessToken: string | undefined): string {
  const id = clientId?.trim();
  const token = accessToken?.trim().replace(/^Bearer\s+/i, '');
  if (!id) throw new StaleCredentialError('FYERS_CLIENT_ID is not set');
  if (!token) throw new StaleCredentialError('FYERS_ACCESS_TOKEN is not set');
  return `${id}:${token}`;
}
