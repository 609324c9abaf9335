/**
 * Values accepted by `KinesisWriter.enqueue`.
 *
 * Byte arrays (including Buffer) pass through, strings are UTF-8 encoded,
 * and anything else is written as JSON.
 */
export type Message = Uint8Array | string | number | boolean | null | object;

export type ClassifiedMessage =
  | { readonly kind: 'bytes'; readonly value: Uint8Array }
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'structured'; readonly value: number | boolean | null | object };

export function classifyMessage(message: Message): ClassifiedMessage {
  if (message instanceof Uint8Array) {
    return { kind: 'bytes', value: message };
  }
  if (typeof message === 'string') {
    return { kind: 'text', value: message };
  }
  return { kind: 'structured', value: message };
}

/**
 * Serialize a message to the bytes that will be written to the stream.
 *
 * Structured values are written as compact `JSON.stringify` output (`{"foo":123}`,
 * no space after separators); consumers comparing bytes against writers that emit
 * spaced JSON will see a difference.
 */
export function encodeMessage(message: Message): Uint8Array {
  const classified = classifyMessage(message);
  switch (classified.kind) {
    case 'bytes':
      return classified.value;
    case 'text':
      return Buffer.from(classified.value, 'utf-8');
    case 'structured': {
      const json: string | undefined = JSON.stringify(classified.value);
      if (json === undefined) {
        throw new TypeError(`message of type ${typeof classified.value} cannot be encoded as JSON`);
      }
      return Buffer.from(json, 'utf-8');
    }
  }
}

export function utf8Length(value: string): number {
  return Buffer.byteLength(value, 'utf-8');
}
