/**
 * TOML parser - drives the lexer and builds the document tree
 *
 * Main entry points: load(path) and loads(content)
 */

import type { Logger } from 'pino';
import { TomlParserOptions } from './types';
import { TomlDocument } from './document';
import { LexerEvent, TomlLexer } from './lexer';
import { LineSource, fileSource, stringSource } from './source';
import { logger as defaultLogger } from './logger';

export class TomlParser {
  private readonly options: TomlParserOptions;
  private readonly log: Logger;

  constructor(options: TomlParserOptions = {}) {
    this.options = options;
    this.log = options.logger ?? defaultLogger;
  }

  public static parse(content: string, options?: TomlParserOptions): TomlDocument {
    const parser = new TomlParser(options);
    return parser.parseContent(content);
  }

  public static parseFile(filePath: string, options?: TomlParserOptions): TomlDocument {
    const parser = new TomlParser(options);
    return parser.parseFile(filePath);
  }

  public parseContent(content: string): TomlDocument {
    return this.parseSource(stringSource(content, this.options.sourceName));
  }

  public parseFile(filePath: string): TomlDocument {
    return this.parseSource(fileSource(filePath));
  }

  /**
   * Lazy, forward-only sequence of lexer events for `source`. The source is
   * released once the sequence ends, is abandoned through `return()`, or
   * fails.
   */
  public tokenize(source: LineSource): Generator<LexerEvent> {
    return new TomlLexer(source).tokens();
  }

  public parseSource(source: LineSource): TomlDocument {
    const document = new TomlDocument();
    let groups = 0;
    let entries = 0;

    this.log.debug({ source: source.name }, 'parse started');
    try {
      for (const event of this.tokenize(source)) {
        if (event.kind === 'group') {
          document.createGroup(event.key, {
            source: source.name,
            row: event.lineNumber,
            column: event.position,
            lineText: event.lineText,
          });
          groups += 1;
          this.log.debug({ group: event.key, line: event.lineNumber }, 'group header');
        } else {
          document.addValue(event.entry, { source: source.name, lineText: event.lineText });
          entries += 1;
        }
      }
    } catch (err) {
      this.log.debug({ err, source: source.name }, 'parse failed');
      throw err;
    }
    this.log.debug({ source: source.name, groups, entries }, 'parse completed');

    return document;
  }
}

export function load(filePath: string, options?: TomlParserOptions): TomlDocument {
  return TomlParser.parseFile(filePath, options);
}

export function loads(content: string, options?: TomlParserOptions): TomlDocument {
  return TomlParser.parse(content, options);
}

export function tokenize(content: string, options: TomlParserOptions = {}): Generator<LexerEvent> {
  return new TomlParser(options).tokenize(stringSource(content, options.sourceName));
}
