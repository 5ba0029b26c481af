/**
 * Codec
 *
 * Converts between wire payloads and objects. The client passes its codec to
 * every request unchanged.
 */

export interface Codec {
  /** Content-Type sent with encoded request bodies */
  readonly contentType: string;
  /** Serialize an object into a request body */
  encode(obj: unknown): string;
  /** Parse a response body; throws when the body is not decodable */
  decode(body: string): unknown;
}

/**
 * JSON pass-through codec used when none is supplied
 */
export const jsonCodec: Codec = {
  contentType: 'application/json',
  encode: (obj) => JSON.stringify(obj),
  decode: (body) => JSON.parse(body),
};
