/** A binary part of a multipart form. */
export interface MultipartFile {
  name: string;
  content: Uint8Array;
  filename: string;
  contentType: string;
}

/** A text part of a multipart form. */
export interface MultipartField {
  name: string;
  value: string;
}

/** One part of a multipart form. */
export type MultipartPart = MultipartFile | MultipartField;

/**
 * Collects named parts in order and builds a `FormData` body from them.
 * Optional fields are skipped when their value is `undefined`.
 */
export class MultipartFormBuilder {
  #parts: MultipartPart[] = [];

  /** Appends a text field. */
  addField(name: string, value: string): this {
    this.#parts.push({ name, value });
    return this;
  }

  /** Appends a text field only when a value is present. */
  addOptionalField(name: string, value: string | number | undefined): this {
    if (value === undefined) {
      return this;
    }

    return this.addField(name, String(value));
  }

  /** Appends a binary file part. */
  addFile(name: string, content: Uint8Array, filename: string, contentType: string): this {
    this.#parts.push({ name, content, filename, contentType });
    return this;
  }

  /** Parts added so far, in order. */
  get parts(): readonly MultipartPart[] {
    return this.#parts;
  }

  /** Builds the `FormData` body. */
  build(): FormData {
    const formData = new FormData();

    for (const part of this.#parts) {
      if ('value' in part) {
        formData.append(part.name, part.value);
        continue;
      }

      formData.append(part.name, new Blob([toArrayBuffer(part.content)], { type: part.contentType }), part.filename);
    }

    return formData;
  }
}

/** Copies bytes into a standalone `ArrayBuffer`, detached from any larger backing buffer. */
function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}
