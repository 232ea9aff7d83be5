/**
 * cifrado
 *
 * Responsabilidad: AES-256-GCM para datos locales del cliente (iv | tag | datos, en base64).
 * Limites: La llave se deriva de un secreto del equipo; un payload alterado falla al descifrar.
 */
import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'node:crypto';

const IV_BYTES = 12;
const TAG_BYTES = 16;

export function derivarLlave(secreto: string): Buffer {
  return createHash('sha256').update(`${secreto}:respaldo:v1`).digest();
}

export function cifrarTexto(textoPlano: string, llave: Buffer): string {
  const iv = randomBytes(IV_BYTES);
  const cipher = createCipheriv('aes-256-gcm', llave, iv);
  const encrypted = Buffer.concat([cipher.update(textoPlano, 'utf8'), cipher.final()]);
  const tag = cipher.getAuthTag();
  return Buffer.concat([iv, tag, encrypted]).toString('base64');
}

export function descifrarTexto(textoCifradoBase64: string, llave: Buffer): string {
  const payload = Buffer.from(textoCifradoBase64.trim(), 'base64');
  if (payload.length <= IV_BYTES + TAG_BYTES) {
    throw new Error('Payload cifrado invalido');
  }
  const iv = payload.subarray(0, IV_BYTES);
  const tag = payload.subarray(IV_BYTES, IV_BYTES + TAG_BYTES);
  const data = payload.subarray(IV_BYTES + TAG_BYTES);
  const decipher = createDecipheriv('aes-256-gcm', llave, iv);
  decipher.setAuthTag(tag);
  return Buffer.concat([decipher.update(data), decipher.final()]).toString('utf8');
}
