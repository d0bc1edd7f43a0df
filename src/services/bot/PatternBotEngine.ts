import { readFileSync } from 'fs';
import { z } from 'zod';
import type { BotEngine, BotTurn } from './BotEngine';

const WILDCARD = '*';

const ruleSchema = z.object({
  pattern: z.string().trim().min(1),
  template: z.string(),
  set: z.record(z.string()).optional(),
});

const ruleFileSchema = z.object({
  rules: z.array(ruleSchema),
});

export type PatternRule = z.infer<typeof ruleSchema>;

interface CompiledRule {
  tokens: string[];
  template: string;
  set?: Record<string, string>;
}

type Session = Record<string, string>;

export const DEFAULT_PATTERNS_FILE = new URL('./patterns.json', import.meta.url);

export function loadPatternRules(file: URL | string = DEFAULT_PATTERNS_FILE): PatternRule[] {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  return ruleFileSchema.parse(raw).rules;
}

/**
 * Splits text into words: apostrophes are dropped ("what's" -> "whats"), any
 * other punctuation separates words.
 */
export function toWords(text: string): string[] {
  return text
    .replace(/['’]/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim()
    .split(' ')
    .filter((word) => word.length > 0);
}

/**
 * Matches pattern tokens against input words. A wildcard consumes one or more
 * words. Returns the text captured by each wildcard, in the input's casing, or
 * null when the pattern does not match.
 */
export function matchPattern(tokens: string[], words: string[]): string[] | null {
  const upper = words.map((word) => word.toUpperCase());

  const walk = (t: number, w: number, stars: string[]): string[] | null => {
    if (t === tokens.length) {
      return w === words.length ? stars : null;
    }
    const token = tokens[t];
    if (token === WILDCARD) {
      // prefer the shortest capture so later literal tokens still get a chance
      for (let end = w + 1; end <= words.length; end++) {
        const result = walk(t + 1, end, [...stars, words.slice(w, end).join(' ')]);
        if (result) return result;
      }
      return null;
    }
    if (w < words.length && upper[w] === token) {
      return walk(t + 1, w + 1, stars);
    }
    return null;
  };

  return walk(0, 0, []);
}

function render(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (_, key: string) => vars[key] ?? '');
}

export interface PatternBotEngineOptions {
  botName: string;
  rules?: PatternRule[];
}

/**
 * Rule-based engine in the spirit of AIML categories: the first rule whose
 * pattern matches the whole input wins. Each user has a session of remembered
 * variables, seeded with the user's registered name and kept in step with it
 * until the user gives the bot a different one.
 */
export class PatternBotEngine implements BotEngine {
  private readonly botName: string;
  private readonly rules: CompiledRule[];
  private sessions = new Map<number, Session>();
  private registeredNames = new Map<number, string>();

  constructor({ botName, rules = loadPatternRules() }: PatternBotEngineOptions) {
    this.botName = botName;
    this.rules = rules.map((rule) => ({
      tokens: rule.pattern.toUpperCase().split(/\s+/),
      template: rule.template,
      set: rule.set,
    }));
  }

  async respond(turn: BotTurn): Promise<string> {
    const words = toWords(turn.content);
    if (words.length === 0) return '';

    for (const rule of this.rules) {
      const stars = matchPattern(rule.tokens, words);
      if (!stars) continue;

      const session = this.sessionFor(turn);
      const vars = (): Record<string, string> => {
        const captured: Record<string, string> = {};
        stars.forEach((star, index) => {
          captured[index === 0 ? 'star' : `star${index + 1}`] = star;
        });
        return { ...session, ...captured, botName: this.botName };
      };

      if (rule.set) {
        for (const [key, value] of Object.entries(rule.set)) {
          session[key] = render(value, vars());
        }
      }
      return render(rule.template, vars()).trim();
    }

    return '';
  }

  getSession(userId: number): Readonly<Session> | undefined {
    return this.sessions.get(userId);
  }

  private sessionFor(turn: BotTurn): Session {
    let session = this.sessions.get(turn.userId);
    if (!session) {
      session = { name: turn.userName };
      this.sessions.set(turn.userId, session);
    }

    // a rename follows through unless the user has told us another name
    const registered = this.registeredNames.get(turn.userId);
    if (registered !== undefined && registered !== turn.userName && session.name === registered) {
      session.name = turn.userName;
    }
    this.registeredNames.set(turn.userId, turn.userName);
    return session;
  }
}
