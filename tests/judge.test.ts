import type { ReadyFlags } from '../shared/src/models';
import { buildUserPrompt, computedAssessment, errorAssessment, formatForJudge, parseJudgeResponse } from '../worker/src/judge';

const clean = { isBad: false, explanation: ['No bad domains detected'], matches: [] };

describe('parseJudgeResponse', () => {
  test('plain JSON', () => {
    expect(parseJudgeResponse('{"confidence_score": 73, "explanation_bullets": ["✅ Same brand"]}')).toEqual({
      confidence_score: 73,
      explanation_bullets: ['✅ Same brand'],
    });
  });

  test('JSON embedded in prose', () => {
    const r = parseJudgeResponse('Here you go: {"confidence_score": 10, "explanation_bullets": []} thanks');
    expect(r.confidence_score).toBe(10);
  });

  test('errors', () => {
    expect(() => parseJudgeResponse('')).toThrow('Empty response from AI judge');
    expect(() => parseJudgeResponse(null)).toThrow('Empty response from AI judge');
    expect(() => parseJudgeResponse('no json here')).toThrow('No valid JSON found in response');
    expect(() => parseJudgeResponse('prefix {not json} suffix')).toThrow(/^Invalid JSON in extracted response: /);
    expect(() => parseJudgeResponse('{"confidence_score": 150, "explanation_bullets": []}')).toThrow(
      /^Invalid AI response: confidence_score /
    );
    expect(() => parseJudgeResponse('{"explanation_bullets": []}')).toThrow(/^Invalid AI response: confidence_score /);
    expect(() => parseJudgeResponse('{"confidence_score": 72.6, "explanation_bullets": []}')).toThrow(
      /^Invalid AI response: confidence_score /
    );
  });
});

test('errorAssessment', () => {
  expect(errorAssessment('timeout')).toEqual({
    success: false,
    source: 'error',
    error: 'timeout',
    confidence_score: 0,
    explanation_bullets: ['❌ Error: timeout', '⚠️ Using computed scores only due to AI service error'],
  });
});

describe('computedAssessment', () => {
  test('no shell: consistency alone', () => {
    const flags: ReadyFlags = { Bad_Domain: clean, Has_Shell: false, Customer_Consistency: { score: 78.6, explanation: [] } };
    const r = computedAssessment({ customer: { BillingState: 'TX' }, flags });
    expect(r.confidence_score).toBe(79);
    expect(r.source).toBe('computed');
    expect(r.explanation_bullets).toEqual([
      '✅ Customer name/website consistency 78.6/100',
      '✅ Account carries address data',
      '⚠️ No external knowledge available - assessment based solely on field analysis',
    ]);
  });

  test('resolved shell', () => {
    const flags: ReadyFlags = {
      Bad_Domain: clean,
      Has_Shell: true,
      Customer_Consistency: { score: 80, explanation: [] },
      Customer_Shell_Coherence: { score: 60, explanation: [] },
      Address_Consistency: { isConsistent: true, explanation: [] },
    };
    const r = computedAssessment({ customer: {}, shell: { Name: 'Acme' }, flags });
    expect(r.confidence_score).toBe(74);
    expect(r.explanation_bullets.slice(1, 3)).toEqual(['⚠️ Customer/shell coherence 60.0/100', '✅ Billing address matches shell']);
  });

  test('unresolved shell', () => {
    const flags: ReadyFlags = { Bad_Domain: clean, Has_Shell: true, Customer_Consistency: { score: 30, explanation: [] } };
    const r = computedAssessment({ customer: {}, flags });
    expect(r.confidence_score).toBe(9);
    expect(r.explanation_bullets[0]).toBe('❌ Customer name/website consistency 30.0/100');
    expect(r.explanation_bullets[1]).toBe('⚠️ Shell account could not be resolved for comparison');
  });
});

describe('formatForJudge', () => {
  const customer = { Name: 'Acme', Website: 'acme.com', BillingState: 'TX', BillingPostalCode: 75001, ParentIdentifier: '001xx000003DGh3' };
  const shell = { Name: 'Acme Holdings', EnrichedState: 'TX' };

  test('parent and shell flags only when a shell exists', () => {
    const flags: ReadyFlags = {
      Bad_Domain: clean,
      Has_Shell: true,
      Customer_Consistency: { score: 100, explanation: [] },
      Customer_Shell_Coherence: { score: 100, explanation: [] },
    };
    const f = formatForJudge({ customer, shell, flags });
    expect(f.customer).toEqual({
      Name: 'Acme',
      Website: 'acme.com',
      Billing_Address: 'TX, 75001',
      Enriched_Company_Name: null,
      Enriched_Website: null,
      Enriched_Address: null,
      ParentId: '001xx000003DGh3',
      Parent: null,
    });
    expect(f.parent?.Name).toBe('Acme Holdings');
    expect(f.parent?.Enriched_Address).toBe('TX');
    expect(Object.keys(f.flags)).toEqual(['Has_Shell', 'Customer_Consistency', 'Customer_Shell_Coherence']);
  });

  test('no shell', () => {
    const flags: ReadyFlags = { Bad_Domain: clean, Has_Shell: false, Customer_Consistency: { score: 50, explanation: [] } };
    const f = formatForJudge({ customer, flags });
    expect(f.parent).toBeUndefined();
    expect(Object.keys(f.flags)).toEqual(['Has_Shell', 'Customer_Consistency']);
    expect(buildUserPrompt({ customer, flags })).toBe(
      `Please assess this account relationship:\n\n${JSON.stringify(f, null, 2)}`
    );
  });
});
