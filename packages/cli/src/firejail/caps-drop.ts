// pattern: Functional Core

/**
 * Capability dropping for the sandboxed program.
 * Only emitted when the `caps` switch is enabled on the command.
 */
export type CapsDrop =
  | { readonly kind: "notSpecified" }
  | { readonly kind: "dropAll" }
  | {
      readonly kind: "settings";
      /** Capabilities to keep (`--caps.keep`) */
      readonly keep: readonly string[];
      /** Capabilities to drop (`--caps.drop`) */
      readonly drop: readonly string[];
    };

/**
 * Accumulates keep/drop capability names independently of any command.
 * Nothing reaches a command until `build()` is called and the result is
 * passed to `FirejailCommand.capsDrop()`.
 */
export class CapsDropBuilder {
  private readonly keepList: string[] = [];
  private readonly dropList: string[] = [];

  keep(capability: string): this {
    this.keepList.push(capability);
    return this;
  }

  keeps(capabilities: Iterable<string>): this {
    this.keepList.push(...capabilities);
    return this;
  }

  drop(capability: string): this {
    this.dropList.push(capability);
    return this;
  }

  drops(capabilities: Iterable<string>): this {
    this.dropList.push(...capabilities);
    return this;
  }

  /**
   * Snapshot the current lists. Later builder calls do not affect the
   * returned value.
   */
  build(): CapsDrop {
    return Object.freeze({
      kind: "settings",
      keep: Object.freeze([...this.keepList]),
      drop: Object.freeze([...this.dropList]),
    });
  }
}

export const CapsDrop = {
  notSpecified: (): CapsDrop => ({ kind: "notSpecified" }),
  dropAll: (): CapsDrop => ({ kind: "dropAll" }),
  builder: (): CapsDropBuilder => new CapsDropBuilder(),
};
