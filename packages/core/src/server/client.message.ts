import { z } from 'zod';
import type { ClientMessage } from '@tickertape/shared';

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('SUBMIT_REQUEST'), payload: z.object({ prompt: z.string().trim().min(1) }) }),
  z.object({ type: z.literal('RESEARCH_START'), payload: z.object({ symbol: z.string().trim().min(1) }) }),
  z.object({ type: z.literal('RESEARCH_ANSWER'), payload: z.object({ answers: z.string() }) }),
  z.object({
    type: z.literal('SLASH_COMMAND'),
    payload: z.object({ command: z.string().startsWith('/'), args: z.string().default('') }),
  }),
]);

export type ParsedClientMessage = { ok: true; message: ClientMessage } | { ok: false; error: string };

/** Decode one frame from a client. */
export function parseClientMessage(raw: string): ParsedClientMessage {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: 'Invalid JSON message' };
  }

  const result = clientMessageSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return { ok: false, error: `Invalid message${where}: ${issue?.message ?? 'unknown shape'}` };
  }
  return { ok: true, message: result.data };
}
