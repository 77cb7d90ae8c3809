import type { CommandClassification, HandlerEntry, RegistryMeta } from "./types";

export type CommandLookup =
  | { ok: true; entry: HandlerEntry }
  | { ok: false; kind: "unknown_command" };

export type CommandSummary = {
  type: string;
  classification: CommandClassification;
  description?: string;
};

/**
 * One immutable generation of the command table. A rebuild produces a new instance;
 * nothing ever edits a published one.
 */
export class CommandRegistry {
  readonly version: number;
  readonly fingerprint: string;
  readonly source: string;
  private readonly entries: ReadonlyMap<string, HandlerEntry>;

  constructor(meta: RegistryMeta, entries: Iterable<HandlerEntry>) {
    this.version = meta.version;
    this.fingerprint = meta.fingerprint;
    this.source = meta.source;
    this.entries = new Map(
      Array.from(entries, (entry): [string, HandlerEntry] => [entry.type, Object.freeze(entry)]),
    );
    Object.freeze(this);
  }

  /** Generation 0: no commands. Used until the first successful load. */
  static empty(source: string): CommandRegistry {
    return new CommandRegistry({ source, fingerprint: "", version: 0 }, []);
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(type: string): CommandLookup {
    const entry = this.entries.get(type);
    return entry ? { ok: true, entry } : { ok: false, kind: "unknown_command" };
  }

  has(type: string): boolean {
    return this.entries.has(type);
  }

  list(): CommandSummary[] {
    return Array.from(this.entries.values())
      .map((entry) => ({
        type: entry.type,
        classification: entry.classification,
        ...(entry.description ? { description: entry.description } : {}),
      }))
      .sort((a, b) => a.type.localeCompare(b.type));
  }
}
