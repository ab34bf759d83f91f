import { z } from 'zod';
import { MAX_TAGS } from './types';

const FENCED_JSON = /```json\s*([\s\S]*?)```/;
const FENCED_ANY = /```[a-zA-Z]*\s*([\s\S]*?)```/;

/**
 * Pull JSON out of a model reply that may wrap it in a ```json or bare ```
 * fence. Throws when the text is not JSON.
 */
export function parseStructuredReply(reply: string): unknown {
  const text = reply.trim();
  const fenced = FENCED_JSON.exec(text) ?? FENCED_ANY.exec(text);
  return JSON.parse(fenced ? fenced[1].trim() : text);
}

export const analysisReplySchema = z.object({
  relevance_score: z.coerce
    .number()
    .finite()
    .catch(0)
    .transform((score) => Math.min(100, Math.max(0, score))),
  content_type: z.string().trim().min(1).catch('unknown'),
  enhanced_description: z.string().trim().optional().catch(undefined),
  tags: z
    .array(z.unknown())
    .catch([])
    .transform((tags) => tags.filter((tag): tag is string => typeof tag === 'string' && tag.trim() !== '').slice(0, MAX_TAGS)),
});

export type AnalysisReply = z.infer<typeof analysisReplySchema>;
