import { z } from 'zod';

// Tokens look like `nav:<generation>:<issuedAt base36>:<seq base36>`.
// The sequence never repeats within a process, so two tokens minted in the same
// millisecond still differ.
const TOKEN_PATTERN = /^nav:(\d+):([0-9a-z]+):([0-9a-z]+)$/;

export const NavigationTokenSchema = z.string().regex(TOKEN_PATTERN, 'malformed navigation token');

export type NavigationToken = z.infer<typeof NavigationTokenSchema>;

export type ParsedToken = {
  generation: number;
  issuedAt: number;
  seq: number;
};

export type TokenMinter = {
  mint: (generation: number) => string;
};

export const createTokenMinter = (now: () => number = Date.now): TokenMinter => {
  let seq = 0;
  return {
    mint: (generation) => {
      seq += 1;
      return `nav:${generation}:${now().toString(36)}:${seq.toString(36)}`;
    },
  };
};

export const parseToken = (token: unknown): ParsedToken | null => {
  const parsed = NavigationTokenSchema.safeParse(token);
  if (!parsed.success) return null;
  const match = TOKEN_PATTERN.exec(parsed.data);
  if (!match) return null;
  const [, generation, issuedAt, seq] = match;
  return {
    generation: Number.parseInt(generation, 10),
    issuedAt: Number.parseInt(issuedAt, 36),
    seq: Number.parseInt(seq, 36),
  };
};

export const isToken = (value: unknown): value is NavigationToken => parseToken(value) !== null;

// Orders by issue time, then sequence. Malformed tokens sort last.
export const compareTokens = (a: string, b: string): number => {
  const left = parseToken(a);
  const right = parseToken(b);
  if (!left || !right) {
    if (left) return -1;
    if (right) return 1;
    return 0;
  }
  if (left.issuedAt !== right.issuedAt) return left.issuedAt - right.issuedAt;
  return left.seq - right.seq;
};
