export type IniSection = Record<string, string>;
export type IniDocument = Record<string, IniSection>;

export class IniParseError extends Error {
  constructor(
    readonly line: number,
    message: string,
  ) {
    super(`line ${line}: ${message}`);
    this.name = 'IniParseError';
  }
}

const SECTION_HEADER = /^\[([^\]]+)\]$/;
const COMMENT_PREFIXES = ['#', ';'];

/**
 * Reads INI text the strict way: a comment is a line of its own. Anything
 * after the separator, `#` and `;` included, is the value.
 *
 * Indented lines continue the value above them. Blank lines inside such a
 * value are kept, trailing ones are dropped. A `[section]` header always
 * starts a section, indented or not.
 */
export function parseIni(source: string): IniDocument {
  const document: IniDocument = {};
  let section: IniSection | undefined;
  let lastKey: string | undefined;
  let blankLines = 0;

  source.split(/\r?\n/).forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const line = rawLine.trim();

    if (line === '') {
      if (lastKey !== undefined) {
        blankLines++;
      }
      return;
    }
    if (COMMENT_PREFIXES.includes(line[0])) {
      return;
    }

    const header = SECTION_HEADER.exec(line);
    if (header) {
      const name = header[1].trim();
      if (name in document) {
        throw new IniParseError(lineNumber, `duplicate section [${name}]`);
      }
      section = {};
      document[name] = section;
      lastKey = undefined;
      blankLines = 0;
      return;
    }

    const isContinuation = /^\s/.test(rawLine);
    if (isContinuation && section && lastKey !== undefined) {
      const current = section[lastKey];
      section[lastKey] = current
        ? `${current}\n${'\n'.repeat(blankLines)}${line}`
        : line;
      blankLines = 0;
      return;
    }

    if (!section) {
      throw new IniParseError(lineNumber, 'key outside of any [section]');
    }

    const separator = line.search(/[=:]/);
    if (separator <= 0) {
      throw new IniParseError(
        lineNumber,
        `expected "key = value", got "${line}"`,
      );
    }

    const key = line.slice(0, separator).trim().toLowerCase();
    if (key in section) {
      throw new IniParseError(lineNumber, `duplicate key "${key}"`);
    }
    section[key] = line.slice(separator + 1).trim();
    lastKey = key;
    blankLines = 0;
  });

  return document;
}
