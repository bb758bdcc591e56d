/** Largest number of items a domain can hold (u16 index). */
export const MAX_ENUM_ITEMS = 0x10000;

/**
 * A member of an {@link EnumDomain}.
 * Items are created by their domain and compared by identity.
 */
export class EnumItem<N extends string = string> {
  /** @internal */
  constructor(
    readonly domain: EnumDomain<N>,
    readonly name: N,
    readonly index: number
  ) {}

  toString(): string {
    return `${this.domain.name}.${this.name}`;
  }
}

/**
 * An ordered, named set of enumeration items.
 * Items encode as their 2-byte index within the domain, so the decoder
 * must be given the same domain that was used to encode.
 *
 * @example
 * ```ts
 * const PlayerState = new EnumDomain("PlayerState", ["Idle", "Running", "Dead"]);
 * const running = PlayerState.get("Running"); // index 1
 * ```
 */
export class EnumDomain<N extends string = string> {
  readonly items: readonly EnumItem<N>[];
  private readonly byName: ReadonlyMap<string, EnumItem<N>>;

  constructor(readonly name: string, names: readonly N[]) {
    if (names.length > MAX_ENUM_ITEMS) {
      throw new RangeError(`Enum "${name}" has ${names.length} items, max ${MAX_ENUM_ITEMS}`);
    }

    const byName = new Map<string, EnumItem<N>>();
    const items = names.map((itemName, index) => {
      if (byName.has(itemName)) {
        throw new Error(`Enum "${name}" declares "${itemName}" more than once`);
      }
      const item = new EnumItem(this, itemName, index);
      byName.set(itemName, item);
      return item;
    });

    this.items = Object.freeze(items);
    this.byName = byName;
  }

  get size(): number {
    return this.items.length;
  }

  get(name: N): EnumItem<N> {
    const item = this.byName.get(name);
    if (!item) {
      throw new Error(`Enum "${this.name}" has no item "${name}"`);
    }
    return item;
  }

  at(index: number): EnumItem<N> | undefined {
    return this.items[index];
  }

  has(item: EnumItem): boolean {
    return item.domain === this;
  }
}
