export interface SymbolResolver {
  /** Returns the broker symbol for a raw token, or undefined when the token is not an instrument. */
  resolve(raw: string): string | undefined;
}

export interface AliasSymbolResolverOptions {
  readonly aliases?: Readonly<Record<string, string>>;
  readonly known?: readonly string[];
  readonly stopWords?: Iterable<string>;
}

function normalizeToken(raw: string): string {
  return raw.trim().toUpperCase().replace(/[^A-Z0-9]/g, "");
}

export class AliasSymbolResolver implements SymbolResolver {
  private readonly aliases: ReadonlyMap<string, string>;
  private readonly known: ReadonlySet<string>;
  private readonly stopWords: ReadonlySet<string>;

  constructor(options: AliasSymbolResolverOptions = {}) {
    this.aliases = new Map(
      Object.entries(options.aliases ?? {}).map(([alias, symbol]) => [normalizeToken(alias), symbol.trim()]),
    );
    this.known = new Set((options.known ?? []).map(normalizeToken));
    this.stopWords = new Set([...(options.stopWords ?? [])].map(normalizeToken));
  }

  resolve(raw: string): string | undefined {
    const token = normalizeToken(raw);
    if (token.length < 2 || this.stopWords.has(token)) {
      return undefined;
    }

    const aliased = this.aliases.get(token);
    if (aliased) {
      return aliased;
    }

    if (this.known.size > 0) {
      return this.known.has(token) ? token : undefined;
    }

    return token.length >= 3 && /[A-Z]/.test(token) ? token : undefined;
  }
}
