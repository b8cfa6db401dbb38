import * as openpgp from 'openpgp';
import type { SigningConfig } from '../config';

/**
 * Release signing with openpgp.js.
 *
 * APT accepts either form:
 * - InRelease: cleartext-signed Release (inline signature)
 * - Release + Release.gpg: detached, armored signature
 */

async function readSigningKey(signing: SigningConfig): Promise<openpgp.PrivateKey> {
  const privateKey = await openpgp.readPrivateKey({ armoredKey: signing.privateKey });
  if (signing.passphrase) {
    return openpgp.decryptKey({ privateKey, passphrase: signing.passphrase });
  }
  return privateKey;
}

/**
 * Sign content as cleartext (InRelease)
 */
export async function signCleartext(content: string, signing: SigningConfig): Promise<string> {
  const message = await openpgp.createCleartextMessage({ text: content });
  return openpgp.sign({
    message,
    signingKeys: await readSigningKey(signing),
  });
}

/**
 * Create a detached text signature (Release.gpg)
 */
export async function signDetached(content: string, signing: SigningConfig): Promise<string> {
  const message = await openpgp.createMessage({ text: content });
  return openpgp.sign({
    message,
    signingKeys: await readSigningKey(signing),
    detached: true,
    format: 'armored',
  });
}

/**
 * Armored public half of a private key
 */
export async function extractPublicKey(privateKeyArmored: string): Promise<string> {
  const privateKey = await openpgp.readPrivateKey({ armoredKey: privateKeyArmored });
  return privateKey.toPublic().armor();
}

/**
 * Fingerprint of a private or public key, uppercase in groups of 4
 */
export async function getKeyFingerprint(armoredKey: string): Promise<string> {
  const key = armoredKey.includes('PRIVATE KEY')
    ? await openpgp.readPrivateKey({ armoredKey })
    : await openpgp.readKey({ armoredKey });

  const fingerprint = key.getFingerprint().toUpperCase();
  return fingerprint.match(/.{1,4}/g)?.join(' ') ?? fingerprint;
}
