import * as fs from 'fs';
import { StringDecoder } from 'string_decoder';
import { TomlError } from './errors';

const READ_CHUNK_SIZE = 64 * 1024;
const BYTE_ORDER_MARK = '\uFEFF';

export interface SourceLine {
  readonly text: string;
  readonly lineNumber: number;
}

/**
 * A forward-only supply of physical lines. Whatever the source holds open is
 * acquired when iteration starts and released when the generator finishes,
 * is returned early, or throws.
 */
export interface LineSource {
  readonly name: string | undefined;
  lines(): Generator<SourceLine>;
}

export function stringSource(content: string, name?: string): LineSource {
  return {
    name,
    *lines() {
      const splitter = new LineSplitter();
      yield* splitter.push(content);
      yield* splitter.end();
    },
  };
}

export function fileSource(filePath: string): LineSource {
  return {
    name: filePath,
    *lines() {
      if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
        throw new TomlError(`Can only load path if is a regular file: ${filePath}`, { source: filePath });
      }

      const fd = fs.openSync(filePath, 'r');
      try {
        const decoder = new StringDecoder('utf8');
        const splitter = new LineSplitter();
        const buffer = Buffer.alloc(READ_CHUNK_SIZE);
        let bytesRead = fs.readSync(fd, buffer, 0, buffer.length, null);
        while (bytesRead > 0) {
          yield* splitter.push(decoder.write(buffer.subarray(0, bytesRead)));
          bytesRead = fs.readSync(fd, buffer, 0, buffer.length, null);
        }
        yield* splitter.push(decoder.end());
        yield* splitter.end();
      } finally {
        fs.closeSync(fd);
      }
    },
  };
}

// Cuts arbitrary chunks of text into lines, holding back the unterminated tail
class LineSplitter {
  private pending = '';
  private lineNumber = 0;

  *push(chunk: string): Generator<SourceLine> {
    if (!chunk) {
      return;
    }
    const text = this.pending + chunk;
    let start = 0;
    let newline = text.indexOf('\n', start);
    while (newline !== -1) {
      yield this.emit(text.slice(start, newline));
      start = newline + 1;
      newline = text.indexOf('\n', start);
    }
    this.pending = text.slice(start);
  }

  *end(): Generator<SourceLine> {
    if (this.pending) {
      yield this.emit(this.pending);
      this.pending = '';
    }
  }

  private emit(raw: string): SourceLine {
    this.lineNumber += 1;
    let text = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    if (this.lineNumber === 1 && text.startsWith(BYTE_ORDER_MARK)) {
      text = text.slice(BYTE_ORDER_MARK.length);
    }
    return { text, lineNumber: this.lineNumber };
  }
}
