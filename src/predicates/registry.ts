export type PredicateContext = Readonly<Record<string, unknown>>;

export type Predicate = (context: PredicateContext) => boolean;

export interface PredicateDefinition {
  name: string;
  description: string;
  evaluate: Predicate;
}

/**
 * Named pure functions used as transition guards and generic rules.
 *
 * Append-only: a name that was valid when a contract was published stays
 * resolvable for as long as the registry lives.
 */
export class PredicateRegistry {
  private readonly predicates = new Map<string, PredicateDefinition>();

  constructor(definitions: PredicateDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  register(definition: PredicateDefinition): this {
    if (this.predicates.has(definition.name)) {
      throw new Error(`Predicate already registered: ${definition.name}`);
    }
    this.predicates.set(definition.name, Object.freeze({ ...definition }));
    return this;
  }

  has(name: string): boolean {
    return this.predicates.has(name);
  }

  get(name: string): PredicateDefinition | undefined {
    return this.predicates.get(name);
  }

  names(): string[] {
    return [...this.predicates.keys()];
  }
}

export type PredicateOutcome =
  | { passed: true }
  | { passed: false; error?: string };

export function runPredicate(definition: PredicateDefinition, context: PredicateContext): PredicateOutcome {
  try {
    return definition.evaluate(context) ? { passed: true } : { passed: false };
  } catch (error) {
    return {
      passed: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}
