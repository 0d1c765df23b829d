import { StringDecoder } from 'node:string_decoder';

/**
 * Assembles complete lines from arbitrarily chunked stream data.
 *
 * Keeps the unterminated tail between pushes; multi-byte characters split
 * across chunks are decoded correctly. Empty lines are dropped.
 */
export class LineSplitter {
  #decoder = new StringDecoder('utf8');
  #tail = '';

  push(chunk: Buffer | string): string[] {
    this.#tail += typeof chunk === 'string' ? chunk : this.#decoder.write(chunk);

    const lines: string[] = [];
    let newlineIndex = this.#tail.indexOf('\n');
    while (newlineIndex !== -1) {
      const line = this.#tail.slice(0, newlineIndex).replace(/\r$/, '');
      this.#tail = this.#tail.slice(newlineIndex + 1);
      if (line.length > 0) lines.push(line);
      newlineIndex = this.#tail.indexOf('\n');
    }
    return lines;
  }

  /** Return whatever is left as a final line, if anything. */
  flush(): string[] {
    const rest = (this.#tail + this.#decoder.end()).replace(/\r$/, '');
    this.#tail = '';
    return rest.length > 0 ? [rest] : [];
  }
}
