/**
 * JWT client assertions for certificate authentication.
 */

import { createHash, createSign } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { AuthResolutionError } from '../../errors/index.js';

/**
 * JWT header.
 */
interface JwtHeader {
  alg: string;
  typ: string;
  x5t: string; // Certificate thumbprint
}

/**
 * JWT client assertion claims.
 */
interface ClientAssertionClaims {
  aud: string; // Token endpoint
  iss: string; // Client ID
  sub: string; // Client ID
  jti: string; // Unique ID
  nbf: number; // Not before
  exp: number; // Expiry
}

/** Private key and certificate read from a PEM file */
export interface PemCertificate {
  privateKey: string;
  /** DER bytes of the first certificate */
  certificateDer: Buffer;
}

const PRIVATE_KEY_PATTERN = /-----BEGIN (?:RSA |ENCRYPTED )?PRIVATE KEY-----[\s\S]+?-----END (?:RSA |ENCRYPTED )?PRIVATE KEY-----/;
const CERTIFICATE_PATTERN = /-----BEGIN CERTIFICATE-----([\s\S]+?)-----END CERTIFICATE-----/;

/**
 * Extract the private key and certificate from PEM text.
 *
 * @throws {AuthResolutionError} If either block is missing
 */
export function parsePemCertificate(pem: string): PemCertificate {
  const privateKey = pem.match(PRIVATE_KEY_PATTERN)?.[0];
  if (!privateKey) {
    throw new AuthResolutionError({ message: 'Unable to extract private key from certificate file' });
  }

  const certificateBody = pem.match(CERTIFICATE_PATTERN)?.[1];
  if (!certificateBody) {
    throw new AuthResolutionError({ message: 'Unable to extract certificate from certificate file' });
  }

  return {
    privateKey,
    certificateDer: Buffer.from(certificateBody.replace(/\s+/g, ''), 'base64'),
  };
}

/**
 * SHA-1 thumbprint of a DER certificate, base64url encoded (the `x5t` header).
 */
export function certificateThumbprint(certificateDer: Buffer): string {
  return base64UrlEncode(createHash('sha1').update(certificateDer).digest());
}

/**
 * Create a client assertion JWT for certificate authentication.
 */
export function createClientAssertion(
  tokenEndpoint: string,
  clientId: string,
  certificate: PemCertificate,
  now: () => number = Date.now
): string {
  const issuedAt = Math.floor(now() / 1000);

  const header: JwtHeader = {
    alg: 'RS256',
    typ: 'JWT',
    x5t: certificateThumbprint(certificate.certificateDer),
  };

  const claims: ClientAssertionClaims = {
    aud: tokenEndpoint,
    iss: clientId,
    sub: clientId,
    jti: uuidv4(),
    nbf: issuedAt,
    exp: issuedAt + 600, // 10 minutes
  };

  const signingInput = `${base64UrlEncodeJson(header)}.${base64UrlEncodeJson(claims)}`;
  const sign = createSign('RSA-SHA256');
  sign.update(signingInput);
  const signature = sign.sign(certificate.privateKey);

  return `${signingInput}.${base64UrlEncode(signature)}`;
}

/**
 * Base64 URL encode a buffer.
 */
export function base64UrlEncode(buffer: Buffer): string {
  return buffer.toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=/g, '');
}

/**
 * Base64 URL decode.
 */
export function base64UrlDecode(str: string): Buffer {
  const padded = str + '='.repeat((4 - (str.length % 4)) % 4);
  return Buffer.from(padded.replace(/-/g, '+').replace(/_/g, '/'), 'base64');
}

function base64UrlEncodeJson(obj: object): string {
  return base64UrlEncode(Buffer.from(JSON.stringify(obj), 'utf8'));
}
