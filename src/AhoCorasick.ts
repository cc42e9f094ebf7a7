export interface AutomatonMatch {
  pattern: string;
  start: number;
  end: number; // Exclusive
}

/**
 * Multi-pattern string matcher (Aho–Corasick).
 *
 * The automaton is built once from a pattern set and then finds every
 * occurrence of every pattern in a single left-to-right pass over the text,
 * O(text length + matches) regardless of how many patterns there are.
 * Transitions are per UTF-16 code unit.
 */
export class AhoCorasick {
  readonly patterns: readonly string[];
  private readonly transitions: Array<Map<string, number>> = [new Map()];
  private readonly failure: number[] = [0];
  // Pattern indices recognized on entering each state, suffix outputs included
  private readonly outputs: number[][] = [[]];

  constructor(patterns: Iterable<string>) {
    this.patterns = Array.from(new Set(patterns)).filter(p => p.length > 0);
    this.patterns.forEach((pattern, index) => this.insert(pattern, index));
    this.buildFailureLinks();
  }

  get size(): number {
    return this.patterns.length;
  }

  /**
   * Every occurrence of every pattern, ordered by end offset
   */
  findAll(text: string): AutomatonMatch[] {
    const matches: AutomatonMatch[] = [];
    if (this.patterns.length === 0) {
      return matches;
    }

    let state = 0;
    for (let i = 0; i < text.length; i++) {
      state = this.next(state, text[i]);
      for (const patternIndex of this.outputs[state]) {
        const pattern = this.patterns[patternIndex];
        matches.push({ pattern, start: i + 1 - pattern.length, end: i + 1 });
      }
    }
    return matches;
  }

  private insert(pattern: string, patternIndex: number): void {
    let state = 0;
    for (const char of pattern.split('')) {
      let target = this.transitions[state].get(char);
      if (target === undefined) {
        target = this.transitions.length;
        this.transitions.push(new Map());
        this.failure.push(0);
        this.outputs.push([]);
        this.transitions[state].set(char, target);
      }
      state = target;
    }
    this.outputs[state].push(patternIndex);
  }

  /**
   * Breadth-first, so a state's failure target is always finished before
   * the state itself
   */
  private buildFailureLinks(): void {
    const queue: number[] = [];
    for (const child of this.transitions[0].values()) {
      this.failure[child] = 0;
      queue.push(child);
    }

    for (let head = 0; head < queue.length; head++) {
      const state = queue[head];
      for (const [char, child] of this.transitions[state]) {
        queue.push(child);

        let fallback = this.failure[state];
        while (fallback !== 0 && !this.transitions[fallback].has(char)) {
          fallback = this.failure[fallback];
        }
        const target = this.transitions[fallback].get(char) ?? 0;
        this.failure[child] = target;
        this.outputs[child] = this.outputs[child].concat(this.outputs[target]);
      }
    }
  }

  private next(state: number, char: string): number {
    let current = state;
    while (current !== 0 && !this.transitions[current].has(char)) {
      current = this.failure[current];
    }
    return this.transitions[current].get(char) ?? 0;
  }
}
