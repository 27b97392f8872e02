import type { NotationContext } from './context';
import { REPRESENTATIONS, parseRepresentation } from './representation';
import type { Representation } from './representation';

/**
 * One expression rendered four ways. Symbols are defined once as an
 * expression string and read back in whichever representation is needed.
 */
export class NotationSet {
  private readonly codes = new Map<Representation, string>();
  private defaultRep: Representation;

  constructor(
    private readonly context: NotationContext,
    expression?: string,
    defaultRepresentation: string = 'unicode'
  ) {
    this.defaultRep = parseRepresentation(defaultRepresentation);
    if (expression !== undefined) {
      this.evaluate(expression);
    }
  }

  /**
   * Render `expression` in every representation and return the default one.
   * If any encoder throws, the previous renderings are kept.
   */
  evaluate(expression: string): string {
    const rendered = REPRESENTATIONS.map(
      (representation): [Representation, string] => [representation, this.context.encoders[representation].parse(expression)]
    );
    for (const [representation, code] of rendered) {
      this.codes.set(representation, code);
    }
    return this.value;
  }

  /** Cached rendering, '' before the first evaluation. */
  get(representation: string): string {
    return this.codes.get(parseRepresentation(representation)) ?? '';
  }

  set(representation: string, code: string): void {
    this.codes.set(parseRepresentation(representation), code);
  }

  get plain(): string {
    return this.get('plain');
  }

  get unicode(): string {
    return this.get('unicode');
  }

  get html(): string {
    return this.get('html');
  }

  get latex(): string {
    return this.get('latex');
  }

  get defaultRepresentation(): Representation {
    return this.defaultRep;
  }

  set defaultRepresentation(representation: string) {
    this.defaultRep = parseRepresentation(representation);
  }

  get value(): string {
    return this.get(this.defaultRep);
  }

  toString(): string {
    return this.value;
  }

  /** One `name: code` line per representation, codes aligned. */
  describe(): string {
    const width = Math.max(...REPRESENTATIONS.map(rep => rep.length)) + 2;
    return [...REPRESENTATIONS]
      .sort()
      .map(rep => `${rep}:`.padEnd(width) + this.get(rep))
      .join('\n');
  }
}

export function evaluateNotation(
  context: NotationContext,
  expression: string,
  defaultRepresentation: string = 'unicode'
): NotationSet {
  return new NotationSet(context, expression, defaultRepresentation);
}
