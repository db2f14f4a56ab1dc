import { z } from 'zod';

const SIGNALS = ['Buy', 'Sell'] as const;

export const InboundEventSchema = z.object({
  ticker: z.string().trim().min(1).max(20).transform((t) => t.toUpperCase()),
  // exact literals; "buy" or "SELL" are rejected rather than normalized
  signal: z.enum(SIGNALS),
  // bounds apply to the rounded value: 1e-9 rounds to 0, 1e301 overflows
  price: z
    .number()
    .finite()
    .transform((p) => Math.round(p * 1e8) / 1e8)
    .pipe(z.number().positive().finite()),
  time: z.string().trim().max(64).datetime({ offset: true }),
  interval: z.string().trim().min(1).max(32).optional(),
  chart: z
    .string()
    .url()
    .max(2048)
    .refine((u) => /^https?:\/\//i.test(u), 'chart must be an http(s) URL')
    .optional(),
});

export type InboundEvent = Readonly<z.infer<typeof InboundEventSchema>>;

export type FieldIssue = { field: string; message: string };

export type ParseResult =
  | { ok: true; event: InboundEvent }
  | { ok: false; issues: FieldIssue[] };

/** Parses and type-checks a raw (already signature-verified) request body. */
export function parseInboundEvent(body: Buffer | string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(typeof body === 'string' ? body : body.toString('utf8'));
  } catch {
    return { ok: false, issues: [{ field: 'body', message: 'body is not valid JSON' }] };
  }
  if (json === null || typeof json !== 'object' || Array.isArray(json)) {
    return { ok: false, issues: [{ field: 'body', message: 'body must be a JSON object' }] };
  }

  const parsed = InboundEventSchema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((i) => ({
        field: i.path.length ? i.path.join('.') : 'body',
        message: i.message,
      })),
    };
  }
  return { ok: true, event: Object.freeze(parsed.data) };
}

/**
 * ticker, signal and alert time identify one signal occurrence. The time is
 * keyed as a UTC instant, so `...:00Z`, `...:00.000Z` and `...:00+00:00` match.
 */
export function idempotencyKey(event: Pick<InboundEvent, 'ticker' | 'signal' | 'time'>): string {
  const at = new Date(event.time);
  const instant = Number.isNaN(at.getTime()) ? event.time : at.toISOString();
  return `${event.ticker}:${event.signal}:${instant}`;
}
