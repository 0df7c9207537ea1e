import sodium from 'libsodium-wrappers';
import { ConfigError, KeyFormatError } from '../errors';

/**
 * Repository public key used to seal secrets, fetched once per run.
 */
export type EncryptionKey = {
  /** Provider key identifier, echoed back with every secret write */
  keyId: string;
  /** Raw Curve25519 public key (32 bytes) */
  publicKey: Uint8Array;
  /** The key as the provider sent it (standard base64) */
  encodedKey: string;
};

/**
 * Fails fast with a ConfigError if the sodium runtime cannot initialise,
 * so no remote state is touched by a run that could never seal its secrets.
 */
export async function ensureSealingAvailable(): Promise<void> {
  try {
    await sodium.ready;
  } catch (error: unknown) {
    throw new ConfigError('Sealed-box encryption is unavailable: libsodium failed to initialise', undefined, {
      cause: error,
    });
  }
}

/**
 * Decodes and validates a base64 public key.
 * @throws KeyFormatError if the key is not base64 or not 32 bytes long
 */
export async function parseEncryptionKey(keyId: string, encodedKey: string): Promise<EncryptionKey> {
  await sodium.ready;

  let publicKey: Uint8Array;
  try {
    publicKey = sodium.from_base64(encodedKey, sodium.base64_variants.ORIGINAL);
  } catch (error: unknown) {
    throw new KeyFormatError(`Public key ${keyId} is not valid base64`, { cause: error });
  }

  assertKeyLength(keyId, publicKey);
  return Object.freeze({ keyId, publicKey, encodedKey });
}

function assertKeyLength(keyId: string, publicKey: Uint8Array): void {
  if (publicKey.length !== sodium.crypto_box_PUBLICKEYBYTES) {
    throw new KeyFormatError(
      `Public key ${keyId} must be ${sodium.crypto_box_PUBLICKEYBYTES} bytes, got ${publicKey.length}`,
    );
  }
}

/**
 * Anonymous sealed-box encryption (X25519 + XSalsa20-Poly1305).
 *
 * Each call generates its own ephemeral sender key pair, so sealing the same
 * plaintext twice yields different ciphertexts. Only the holder of the
 * matching private key can open the result.
 */
export class CryptoSealer {
  /**
   * @returns the sealed box, base64-encoded
   * @throws KeyFormatError if the key is malformed
   */
  async seal(key: EncryptionKey, plaintext: string): Promise<string> {
    await sodium.ready;
    assertKeyLength(key.keyId, key.publicKey);

    const sealed = sodium.crypto_box_seal(sodium.from_string(plaintext), key.publicKey);
    return sodium.to_base64(sealed, sodium.base64_variants.ORIGINAL);
  }
}
