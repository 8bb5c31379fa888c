/**
 * Answers keyed by the exact question string. No trimming or case folding:
 * "What is X?" and "what is x" are separate entries.
 */
export class AnswerCache {
  private readonly answers = new Map<string, string>();

  get size(): number {
    return this.answers.size;
  }

  has(question: string): boolean {
    return this.answers.has(question);
  }

  get(question: string): string | undefined {
    return this.answers.get(question);
  }

  put(question: string, answer: string): void {
    this.answers.set(question, answer);
  }
}
