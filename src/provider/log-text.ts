import vocabulary from './log-vocabulary.json';

export type RandomSource = () => number;

export type LogEntry = [level: string, message: string];

// Weighted towards INFO like real application logs
const LOG_LEVELS = ['INFO', 'INFO', 'INFO', 'INFO', 'INFO', 'DEBUG', 'DEBUG', 'WARN', 'ERROR'];

/**
 * Generates plausible log lines of a requested length
 */
export class LogTextHelper {
  constructor(private readonly random: RandomSource = Math.random) {}

  /**
   * A level and a message of exactly targetLength characters
   */
  generateTextWithLen(targetLength: number): LogEntry {
    const level = this.pick(LOG_LEVELS);
    const parts: string[] = [];
    let length = 0;

    while (length < targetLength) {
      const word = this.pick(vocabulary.words);
      parts.push(word);
      length += word.length + 1;
    }

    return [level, parts.join(' ').slice(0, Math.max(0, targetLength))];
  }

  randomInt(bound: number): number {
    return Math.floor(this.random() * bound);
  }

  private pick<T>(items: readonly T[]): T {
    return items[this.randomInt(items.length) % items.length];
  }
}

/**
 * Deterministic readable name, e.g. 37 -> "beta37"
 */
export function nameSuffix(seed: number): string {
  const suffixes = vocabulary.nameSuffixes;
  return `${suffixes[seed % suffixes.length]}${seed % 1000}`;
}
