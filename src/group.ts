/**
 * TomlGroup - a node in the key namespace tree
 *
 * Groups own their child groups and their entries. The parent link is only
 * followed to rebuild the full key.
 */

import { TomlEntry, joinKey, splitKey } from './entry';
import { SourceLocation, TomlDuplicateKeyError, TomlKeyNotFoundError } from './errors';

export const GROUP_START = '[';
export const GROUP_END = ']';

export class TomlGroup {
  readonly key: string;
  readonly parent: TomlGroup | null;
  private readonly children: Map<string, TomlGroup> = new Map();
  private readonly values: Map<string, TomlEntry> = new Map();

  constructor(key: string, parent: TomlGroup | null = null) {
    this.key = key;
    this.parent = parent;
  }

  get fullKey(): string {
    return this.parent ? joinKey(this.parent.fullKey, this.key) : this.key;
  }

  get groups(): TomlGroup[] {
    return [...this.children.values()];
  }

  get items(): TomlEntry[] {
    return [...this.values.values()];
  }

  /** Every entry from this node down: own items first, then each child's. */
  *allItems(): Generator<TomlEntry> {
    yield* this.values.values();
    for (const child of this.children.values()) {
      yield* child.allItems();
    }
  }

  tryGetGroup(path: string | readonly string[]): TomlGroup | undefined {
    let group: TomlGroup = this;
    for (const part of toKeyParts(path)) {
      const child = group.children.get(part);
      if (!child) {
        return undefined;
      }
      group = child;
    }
    return group;
  }

  getGroup(path: string | readonly string[]): TomlGroup {
    const parts = toKeyParts(path);
    let group: TomlGroup = this;
    for (let i = 0; i < parts.length; i += 1) {
      const child = group.children.get(parts[i] ?? '');
      if (!child) {
        throw new TomlKeyNotFoundError(
          joinKey(this.fullKey, parts.join('.')),
          joinKey(this.fullKey, parts.slice(0, i + 1).join('.'))
        );
      }
      group = child;
    }
    return group;
  }

  /**
   * Resolves the group at `path`, creating every missing segment. `location`
   * is attached to the error when a segment already names an entry.
   */
  createGroup(path: string | readonly string[], location: SourceLocation = {}): TomlGroup {
    let group: TomlGroup = this;
    for (const part of toKeyParts(path)) {
      let child = group.children.get(part);
      if (!child) {
        if (group.values.has(part)) {
          throw new TomlDuplicateKeyError(joinKey(group.fullKey, part), location);
        }
        child = new TomlGroup(part, group);
        group.children.set(part, child);
      }
      group = child;
    }
    return group;
  }

  /**
   * Inserts `entry` under its full name, relative to this group. A key that
   * already names an entry or a group is a duplicate. The error is located
   * at the entry, with `location` supplying the source name and line text.
   */
  addValue(entry: TomlEntry, location: SourceLocation = {}): void {
    const located: SourceLocation = { ...location, row: entry.lineNumber, column: entry.position };
    const parts = splitKey(entry.fullName);
    const name = parts.pop() ?? '';
    const group = this.createGroup(parts, located);
    if (group.values.has(name) || group.children.has(name)) {
      throw new TomlDuplicateKeyError(joinKey(group.fullKey, name), located);
    }
    group.values.set(name, entry);
  }

  tryGetEntry(path: string): TomlEntry | undefined {
    const parts = splitKey(path);
    const name = parts.pop() ?? '';
    return this.tryGetGroup(parts)?.values.get(name);
  }

  getEntry(path: string): TomlEntry {
    const parts = splitKey(path);
    const name = parts.pop() ?? '';
    const entry = this.getGroup(parts).values.get(name);
    if (!entry) {
      throw new TomlKeyNotFoundError(joinKey(this.fullKey, path));
    }
    return entry;
  }

  toString(): string {
    let rendered = '';
    if (this.key) {
      rendered += `${GROUP_START}${this.fullKey}${GROUP_END}\n`;
    }
    for (const [name, entry] of this.values) {
      rendered += `${name} = ${entry.toString()}\n`;
    }
    for (const child of this.children.values()) {
      rendered += child.toString();
      rendered += '\n';
    }
    return rendered;
  }
}

function toKeyParts(path: string | readonly string[]): readonly string[] {
  if (typeof path === 'string') {
    return path ? splitKey(path) : [];
  }
  return path;
}
