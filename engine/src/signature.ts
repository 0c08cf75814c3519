/**
 * otakeeper Engine — Detached Signature Verification
 *
 * Verifies that a package binary was signed by the holder of the
 * device's trusted key. The key type is resolved once into a tagged
 * union and verification matches on the tag:
 *
 *   rsa          PKCS#1 v1.5 padding, SHA-256 over the raw bytes
 *   ed25519      the scheme's own verification
 *   unsupported  always fails
 *
 * Any parsing error, malformed signature or mismatch comes back as
 * `false`; callers never see a third "unknown" outcome.
 */

import * as crypto from "crypto";
import { Logger } from "./utils/logger";

export type TrustedKey =
  | { kind: "rsa"; key: crypto.KeyObject }
  | { kind: "ed25519"; key: crypto.KeyObject }
  | { kind: "unsupported"; reason: string };

/**
 * Resolve a PEM-encoded public key into a TrustedKey.
 * Never throws: an unparseable key is reported as unsupported.
 */
export function parseTrustedKey(pem: string | Buffer): TrustedKey {
  let key: crypto.KeyObject;
  try {
    key = crypto.createPublicKey(pem);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { kind: "unsupported", reason: `Unreadable public key: ${message}` };
  }

  switch (key.asymmetricKeyType) {
    case "rsa":
      return { kind: "rsa", key };
    case "ed25519":
      return { kind: "ed25519", key };
    default:
      return {
        kind: "unsupported",
        reason: `Unsupported key type: ${key.asymmetricKeyType ?? "unknown"}`,
      };
  }
}

/**
 * Verify a detached signature over `message`.
 */
export function verifySignature(
  trusted: TrustedKey,
  message: Buffer,
  signature: Buffer,
  logger: Logger,
): boolean {
  if (trusted.kind === "unsupported") {
    logger.error({ reason: trusted.reason }, "Signature verification failed");
    return false;
  }

  try {
    const valid =
      trusted.kind === "rsa"
        ? crypto.verify(
            "sha256",
            message,
            { key: trusted.key, padding: crypto.constants.RSA_PKCS1_PADDING },
            signature,
          )
        : crypto.verify(null, message, trusted.key, signature);

    if (valid) {
      logger.info({ keyType: trusted.kind }, "Signature has been verified");
    } else {
      logger.error({ keyType: trusted.kind }, "Signature verification failed");
    }
    return valid;
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    logger.error(
      { keyType: trusted.kind, error: reason },
      "Error during signature verification",
    );
    return false;
  }
}

/**
 * Sign `message` with a PEM-encoded private key, using the scheme that
 * matches the key type. Used by the packaging tool and by tests.
 *
 * @throws if the key cannot be read or is neither RSA nor Ed25519
 */
export function signMessage(privateKeyPem: string | Buffer, message: Buffer): Buffer {
  const key = crypto.createPrivateKey(privateKeyPem);

  switch (key.asymmetricKeyType) {
    case "rsa":
      return crypto.sign("sha256", message, {
        key,
        padding: crypto.constants.RSA_PKCS1_PADDING,
      });
    case "ed25519":
      return crypto.sign(null, message, key);
    default:
      throw new Error(
        `Unsupported signing key type: ${key.asymmetricKeyType ?? "unknown"}`,
      );
  }
}

/**
 * Derive the PEM public key that matches a private key.
 */
export function publicKeyFromPrivate(privateKeyPem: string | Buffer): string {
  const publicKey = crypto.createPublicKey(crypto.createPrivateKey(privateKeyPem));
  return publicKey.export({ type: "spki", format: "pem" }).toString();
}
