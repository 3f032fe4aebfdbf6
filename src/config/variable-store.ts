import { ConfigurationError } from "../errors.js";

const BRACE_PLACEHOLDER = /\$\{([^}]+)\}/g;
const PERCENT_PLACEHOLDER = /%([^%\s]+)%/g;

/**
 * Per-client string variables substituted into connection descriptors as
 * `${key}` or `%key%`. Lookups fall back to the environment.
 */
export class VariableStore {
  private readonly values = new Map<string, string>();

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  set(key: string, value: string): void {
    this.values.set(key, value);
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  unset(key: string): boolean {
    return this.values.delete(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  clear(): void {
    this.values.clear();
  }

  /** Replace every placeholder in `text`; an unknown key is a {@link ConfigurationError}. */
  expand(text: string): string {
    const lookup = (placeholder: string, key: string): string => {
      const value = this.values.get(key) ?? this.env[key];
      if (value === undefined) {
        throw new ConfigurationError(`Unresolved variable ${placeholder}`);
      }
      return value;
    };
    return text.replace(BRACE_PLACEHOLDER, lookup).replace(PERCENT_PLACEHOLDER, lookup);
  }
}
