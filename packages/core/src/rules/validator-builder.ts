/**
 * Typed builder for TypeValidator declarations:
 *
 *   defineValidator<SearchRequest>('SearchRequest', (v) => {
 *     v.ruleFor('query').notEmpty().maximumLength(200);
 *     v.ruleFor('page').greaterThan(0);
 *   });
 */

import type {
  NumericParam,
  PropertyRules,
  Rule,
  Scalar,
  TypeValidator,
} from '../types/rules.js';

export class RuleChainBuilder {
  constructor(private readonly rules: Rule[]) {}

  notNull(): this {
    return this.add({ kind: 'notNull' });
  }

  notEmpty(): this {
    return this.add({ kind: 'notEmpty' });
  }

  maximumLength(max: number): this {
    return this.add({ kind: 'maximumLength', max });
  }

  minimumLength(min: number): this {
    return this.add({ kind: 'minimumLength', min });
  }

  length(min: number, max?: number): this {
    return this.add({ kind: 'length', min, max });
  }

  greaterThan(value: NumericParam): this {
    return this.add({ kind: 'greaterThan', value });
  }

  greaterThanOrEqual(value: NumericParam): this {
    return this.add({ kind: 'greaterThanOrEqual', value });
  }

  lessThan(value: NumericParam): this {
    return this.add({ kind: 'lessThan', value });
  }

  lessThanOrEqual(value: NumericParam): this {
    return this.add({ kind: 'lessThanOrEqual', value });
  }

  inclusiveBetween(from: NumericParam, to: NumericParam): this {
    return this.add({ kind: 'inclusiveBetween', from, to });
  }

  exclusiveBetween(from: NumericParam, to: NumericParam): this {
    return this.add({ kind: 'exclusiveBetween', from, to });
  }

  matches(pattern: string | RegExp): this {
    const source = typeof pattern === 'string' ? pattern : pattern.source;
    return this.add({ kind: 'matches', pattern: source });
  }

  emailAddress(): this {
    return this.add({ kind: 'emailAddress' });
  }

  isInEnum(values: readonly Scalar[]): this {
    return this.add({ kind: 'isInEnum', values });
  }

  /** Every rule declared so far in this chain only applies conditionally. */
  conditional(): this {
    for (let i = 0; i < this.rules.length; i += 1) {
      const rule = this.rules[i];
      if (rule) this.rules[i] = { ...rule, when: 'conditional' };
    }
    return this;
  }

  private add(rule: Rule): this {
    this.rules.push(rule);
    return this;
  }
}

export class ValidatorBuilder<T> {
  readonly #properties: PropertyRules[] = [];

  ruleFor<K extends keyof T & string>(property: K): RuleChainBuilder {
    const rules: Rule[] = [];
    this.#properties.push({ property, rules });
    return new RuleChainBuilder(rules);
  }

  build(typeName: string): TypeValidator {
    return {
      typeName,
      properties: this.#properties.map(({ property, rules }) => ({
        property,
        rules: [...rules],
      })),
    };
  }
}

export function defineValidator<T>(
  typeName: string,
  declare: (builder: ValidatorBuilder<T>) => void
): TypeValidator {
  const builder = new ValidatorBuilder<T>();
  declare(builder);
  return builder.build(typeName);
}
