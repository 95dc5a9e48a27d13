/**
 * Placeholder resolver for parameter values.
 *
 * Resolves ${VAR} and ${VAR:default} from an environment map (process.env
 * unless given) so values reach the engine already substituted. `$${` is an
 * escape for a literal `${`.
 */

export interface ResolveResult {
  resolved: string;
  unresolvedVars: string[];
}

const PLACEHOLDER = /\$?\$\{([A-Za-z_][A-Za-z0-9_.]*)(?::([^}]*))?\}/g;

export class PlaceholderResolver {
  constructor(private readonly env: Record<string, string | undefined> = process.env) {}

  static hasPlaceholders(input: string): boolean {
    return input.includes('${');
  }

  resolve(input: string): ResolveResult {
    if (!PlaceholderResolver.hasPlaceholders(input)) {
      return { resolved: input, unresolvedVars: [] };
    }

    const unresolved: string[] = [];
    const resolved = input.replace(PLACEHOLDER, (match: string, name: string, fallback: string | undefined) => {
      if (match.startsWith('$$')) {
        return match.substring(1);
      }
      const value = this.env[name];
      if (value !== undefined) {
        return value;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      unresolved.push(name);
      return match;
    });

    return { resolved, unresolvedVars: [...new Set(unresolved)] };
  }
}
