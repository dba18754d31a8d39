import { z } from 'zod';
import { customerAddress, fieldText, type AccountRecord, type AiAssessment, type FieldValue, type ReadyFlags } from '@shellmatch/shared';
import type { JudgeInput } from './types';

const JudgeResponseSchema = z.object({
  confidence_score: z.number().int().min(0).max(100),
  explanation_bullets: z.array(z.string()),
});

export type JudgeResponse = z.infer<typeof JudgeResponseSchema>;

function text(v: FieldValue): string | null {
  return fieldText(v) || null;
}

function joined(parts: FieldValue[]): string | null {
  const s = parts.map(fieldText).filter(Boolean).join(', ');
  return s || null;
}

function describeAccount(r: AccountRecord) {
  return {
    Name: text(r.Name),
    Website: text(r.Website),
    Billing_Address: joined([r.BillingState, r.BillingCountry, r.BillingPostalCode]),
    Enriched_Company_Name: text(r.EnrichedCompanyName),
    Enriched_Website: text(r.EnrichedWebsite),
    Enriched_Address: joined([r.EnrichedState, r.EnrichedCountry, r.EnrichedPostalCode]),
  };
}

export function formatForJudge({ customer, shell, flags }: JudgeInput) {
  const formatted: {
    customer: Record<string, string | null>;
    parent?: Record<string, string | null>;
    flags: Omit<ReadyFlags, 'Bad_Domain'>;
  } = {
    customer: {
      ...describeAccount(customer),
      ParentId: text(customer.ParentIdentifier),
      Parent: text(customer.ParentName),
    },
    flags: {
      Has_Shell: flags.Has_Shell,
      Customer_Consistency: flags.Customer_Consistency,
    },
  };
  if (flags.Has_Shell && shell) {
    formatted.parent = describeAccount(shell);
    if (flags.Customer_Shell_Coherence) formatted.flags.Customer_Shell_Coherence = flags.Customer_Shell_Coherence;
    if (flags.Address_Consistency) formatted.flags.Address_Consistency = flags.Address_Consistency;
  }
  return formatted;
}

export function buildUserPrompt(input: JudgeInput): string {
  return `Please assess this account relationship:\n\n${JSON.stringify(formatForJudge(input), null, 2)}`;
}

function safeJsonParse(s: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(s) };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
}

// Whole reply as JSON, else the first {...} block in it
export function parseJudgeResponse(raw: string | null | undefined): JudgeResponse {
  const body = (raw || '').trim();
  if (!body) throw new Error('Empty response from AI judge');
  let parsed = safeJsonParse(body);
  if (!parsed.ok) {
    const block = /\{[\s\S]*\}/.exec(body);
    if (!block) throw new Error('No valid JSON found in response');
    parsed = safeJsonParse(block[0]);
    if (!parsed.ok) throw new Error(`Invalid JSON in extracted response: ${parsed.error}`);
  }
  const checked = JudgeResponseSchema.safeParse(parsed.value);
  if (!checked.success) {
    const issue = checked.error.issues[0];
    throw new Error(`Invalid AI response: ${issue ? `${issue.path.join('.') || 'body'} ${issue.message}` : 'schema mismatch'}`);
  }
  return checked.data;
}

export function errorAssessment(message: string): AiAssessment {
  return {
    success: false,
    source: 'error',
    error: message,
    confidence_score: 0,
    explanation_bullets: [`❌ Error: ${message}`, '⚠️ Using computed scores only due to AI service error'],
  };
}

// Deterministic stand-in for the AI judge, built from the flags alone:
// metadata coherence up to 30, shell coherence up to 50, address up to 20.
// Accounts without a shell are judged on metadata coherence only.
export function computedAssessment({ customer, shell, flags }: JudgeInput): AiAssessment {
  const consistency = flags.Customer_Consistency.score;
  const bullets: string[] = [];
  const mark = (score: number) => (score >= 70 ? '✅' : score >= 40 ? '⚠️' : '❌');

  bullets.push(`${mark(consistency)} Customer name/website consistency ${consistency.toFixed(1)}/100`);
  let confidence: number;
  if (flags.Has_Shell && shell && flags.Customer_Shell_Coherence) {
    const coherence = flags.Customer_Shell_Coherence.score;
    const addressMatch = flags.Address_Consistency?.isConsistent ?? false;
    confidence = 0.3 * consistency + 0.5 * coherence + (addressMatch ? 20 : 0);
    bullets.push(`${mark(coherence)} Customer/shell coherence ${coherence.toFixed(1)}/100`);
    bullets.push(addressMatch ? '✅ Billing address matches shell' : '❌ Billing address differs from shell or is missing');
  } else if (flags.Has_Shell) {
    confidence = 0.3 * consistency;
    bullets.push('⚠️ Shell account could not be resolved for comparison');
  } else {
    confidence = consistency;
    bullets.push(customerAddress(customer) ? '✅ Account carries address data' : '⚠️ Account has no address data');
  }
  bullets.push('⚠️ No external knowledge available - assessment based solely on field analysis');
  return {
    success: true,
    source: 'computed',
    confidence_score: Math.max(0, Math.min(100, Math.round(confidence))),
    explanation_bullets: bullets,
  };
}
