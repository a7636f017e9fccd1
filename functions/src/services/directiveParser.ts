/**
 * Directive Parser
 *
 * Reads a record modification directive ({ action, target, details }) out of
 * a chat reply. A modify_record tool call takes precedence; otherwise the
 * reply text is scanned from its first `{` to its last `}`, but only when it
 * mentions "add" or "remove". The text scan can pick up braces that have
 * nothing to do with a directive; every candidate is validated before use.
 */

import { z } from 'zod';
import type { ChatReply } from './openai';
import { extractBracedSpan, safeParseJson } from './openai/jsonParser';

const directiveSchema = z.object({
  action: z
    .string()
    .default('')
    .transform((value) => value.toLowerCase()),
  target: z.string().default(''),
  details: z.unknown().optional(),
});

export interface RecordDirective {
  action: string;
  target: string;
  details: unknown;
}

export type DirectiveSource = 'tool_call' | 'text';

export type DirectiveExtraction =
  | { kind: 'none' }
  | { kind: 'invalid'; source: DirectiveSource; error: string }
  | { kind: 'directive'; source: DirectiveSource; directive: RecordDirective };

const DIRECTIVE_KEYWORDS = ['add', 'remove'];

function validateDirective(source: DirectiveSource, json: string): DirectiveExtraction {
  const { data, error } = safeParseJson(json);
  if (error) {
    return { kind: 'invalid', source, error };
  }

  const parsed = directiveSchema.safeParse(data);
  if (!parsed.success) {
    return { kind: 'invalid', source, error: 'Directive must be an object with string action and target' };
  }

  return {
    kind: 'directive',
    source,
    directive: {
      action: parsed.data.action,
      target: parsed.data.target,
      details: parsed.data.details ?? {},
    },
  };
}

export function extractDirectiveFromText(text: string): DirectiveExtraction {
  if (!DIRECTIVE_KEYWORDS.some((keyword) => text.includes(keyword))) {
    return { kind: 'none' };
  }

  const candidate = extractBracedSpan(text);
  if (!candidate) {
    return { kind: 'none' };
  }

  return validateDirective('text', candidate);
}

export function extractDirective(reply: ChatReply): DirectiveExtraction {
  if (reply.toolCallArguments !== null) {
    return validateDirective('tool_call', reply.toolCallArguments);
  }

  return extractDirectiveFromText(reply.text);
}
