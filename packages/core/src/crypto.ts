import crypto from 'crypto';

/** 256 bits, hex-encoded */
const GATEWAY_TOKEN_BYTES = 32;

export const GATEWAY_TOKEN_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Generate a gateway auth token: 64 lowercase hex characters
 */
export function generateGatewayToken(): string {
  return crypto.randomBytes(GATEWAY_TOKEN_BYTES).toString('hex');
}
