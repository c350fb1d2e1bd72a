/**
 * Immutable SAS macro variable environment
 *
 * Each block of a program is evaluated against a snapshot; `%let` updates
 * produce a new environment instead of mutating the current one.
 */

const RE_LET = /%let\s+([A-Za-z_][A-Za-z0-9_]*)\s*=\s*([^;]*);/gi;
const RE_REF_DOTTED = /&([A-Za-z0-9_]+)\./g;
const RE_REF = /&([A-Za-z0-9_]+)/g;
const RE_WRAPPER = /^%(?:str|nrstr|upcase|quote|nrquote)\(([\s\S]*)\)$/i;

const DEFAULT_EXPANSION_PASSES = 5;

export class MacroEnvironment {
  private readonly values: ReadonlyMap<string, string>;

  private constructor(values: ReadonlyMap<string, string>) {
    this.values = values;
  }

  static empty(): MacroEnvironment {
    return new MacroEnvironment(new Map());
  }

  static from(values: Record<string, string>): MacroEnvironment {
    return new MacroEnvironment(
      new Map(Object.entries(values).map(([name, value]) => [name.toLowerCase(), value]))
    );
  }

  get(name: string): string | undefined {
    return this.values.get(name.toLowerCase());
  }

  get size(): number {
    return this.values.size;
  }

  entries(): Array<[string, string]> {
    return [...this.values.entries()];
  }

  /**
   * New environment with `updates` layered on top
   */
  with(updates: ReadonlyMap<string, string>): MacroEnvironment {
    if (updates.size === 0) return this;
    const merged = new Map(this.values);
    for (const [name, value] of updates) {
      merged.set(name.toLowerCase(), value);
    }
    return new MacroEnvironment(merged);
  }

  /**
   * Substitute `&name.` and `&name` until nothing changes or the pass limit is hit.
   * Unknown references are left in place.
   */
  expand(text: string, maxPasses: number = DEFAULT_EXPANSION_PASSES): string {
    let current = text;
    for (let pass = 0; pass < maxPasses; pass++) {
      let changed = false;
      const substitute = (match: string, name: string): string => {
        const value = this.get(name);
        if (value === undefined) return match;
        changed = true;
        return value;
      };
      current = current.replace(RE_REF_DOTTED, substitute).replace(RE_REF, substitute);
      // `&lib..tbl` leaves a doubled delimiter behind
      current = current.replace(/\.\./g, '.');
      if (!changed) break;
    }
    return current;
  }

  /**
   * Evaluate the `%let` statements of `text` in order. Each right-hand side
   * sees this environment plus the assignments before it.
   */
  evaluateAssignments(text: string): Map<string, string> {
    const updates = new Map<string, string>();
    for (const match of text.matchAll(RE_LET)) {
      const scope = this.with(updates);
      updates.set(match[1].toLowerCase(), sanitizeMacroValue(scope.expand(match[2])));
    }
    return updates;
  }
}

/**
 * Strip surrounding quotes and one quoting-function wrapper such as `%str(...)`
 */
export function sanitizeMacroValue(raw: string): string {
  let value = raw.trim();
  while (value.length >= 2 && value[0] === value[value.length - 1] && (value[0] === '"' || value[0] === "'")) {
    value = value.slice(1, -1).trim();
  }
  const wrapped = RE_WRAPPER.exec(value);
  return wrapped ? wrapped[1].trim() : value;
}
