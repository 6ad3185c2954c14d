/**
 * Session Module - Port Interfaces
 */

/**
 * Pulls the session token out of a transport-specific request.
 */
export interface SessionExtractor<TRequest> {
  /** The token, or null when the request carries none */
  extractToken(request: TRequest): string | null;
}
