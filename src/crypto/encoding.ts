/**
 * Base64 and string encoding utilities.
 * Uses btoa/atob and TextEncoder/TextDecoder so the client side also runs in browsers.
 */

/**
 * Encode a Uint8Array to a standard base64 string.
 */
export function base64Encode(bytes: Uint8Array): string {
  let binary = '';
  for (let i = 0; i < bytes.length; i++) {
    binary += String.fromCharCode(bytes[i]);
  }
  return btoa(binary);
}

/**
 * Decode a standard base64 string to a Uint8Array.
 */
export function base64Decode(str: string): Uint8Array {
  const binary = atob(str);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

/**
 * Encode bytes as unpadded base64url (RFC 4648 §5), as used in credential tokens.
 */
export function base64UrlEncode(bytes: Uint8Array): string {
  return base64Encode(bytes).replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

/**
 * Decode unpadded base64url.
 */
export function base64UrlDecode(str: string): Uint8Array {
  const b64 = str.replace(/-/g, '+').replace(/_/g, '/');
  return base64Decode(b64.padEnd(b64.length + ((4 - (b64.length % 4)) % 4), '='));
}

/**
 * Encode a UTF-8 string to bytes.
 */
export function strToBytes(s: string): Uint8Array {
  return new TextEncoder().encode(s);
}

/**
 * Decode bytes to a UTF-8 string.
 */
export function bytesToStr(b: Uint8Array): string {
  return new TextDecoder().decode(b);
}
