import {
  addressConsistency,
  badDomainCheck,
  customerConsistency,
  errorMessage,
  fieldText,
  logger,
  sameEntity,
  shellCoherence,
  type AccountRecord,
  type AiAssessment,
  type ReadyFlags,
  type StoppedFlags,
} from '@shellmatch/shared';
import { errorAssessment } from './judge';
import type { PipelineDeps } from './types';

export type StepName = 'bad_domain_check' | 'shell_check' | 'consistency_scoring' | 'shell_lookup' | 'shell_coherence_scoring' | 'ai_judgment';
export type StepStatus = 'SUCCEEDED' | 'SKIPPED' | 'STOPPED' | 'UNRESOLVED' | 'FAILED';
export type StepInfo = Record<string, string | number | boolean>;
export type StepRecord = { name: StepName; status: StepStatus; info?: StepInfo };

export type StoppedAnalysis = {
  accountId: string;
  stage: 'STOPPED_BAD_DOMAIN';
  flags: StoppedFlags;
  steps: StepRecord[];
};

export type ReadyAnalysis = {
  accountId: string;
  stage: 'PAYLOAD_READY';
  flags: ReadyFlags;
  shell?: AccountRecord;
  steps: StepRecord[];
  assessment: AiAssessment;
};

export type FlagAnalysis = StoppedAnalysis | ReadyAnalysis;

export function computeHasShell(accountId?: string | null, parentId?: string | null): boolean {
  if (!(parentId || '').trim()) return false;
  return !sameEntity(accountId, parentId);
}

async function resolveShell(parentId: string, deps: PipelineDeps, step: (s: StepRecord) => void): Promise<AccountRecord | null> {
  try {
    const shell = await deps.source.fetchByIdentifier(parentId);
    if (!shell) {
      step({ name: 'shell_lookup', status: 'UNRESOLVED', info: { reason: 'NOT_FOUND', parentId } });
      return null;
    }
    step({ name: 'shell_lookup', status: 'SUCCEEDED', info: { parentId, source: deps.source.name } });
    return shell;
  } catch (e) {
    logger.warn('Shell lookup failed', { parentId, source: deps.source.name, err: errorMessage(e) });
    step({ name: 'shell_lookup', status: 'UNRESOLVED', info: { reason: 'ERROR', parentId, error: errorMessage(e) } });
    return null;
  }
}

// Collaborator failures degrade the result; this never rejects
export async function runFlagPipeline(account: AccountRecord, deps: PipelineDeps): Promise<FlagAnalysis> {
  const accountId = fieldText(account.Identifier);
  const steps: StepRecord[] = [];
  const step = (s: StepRecord) => steps.push(s);

  const badDomain = badDomainCheck(account, deps.badDomains);
  if (badDomain.isBad) {
    step({ name: 'bad_domain_check', status: 'STOPPED', info: { matches: badDomain.matches.length } });
    logger.info('Bad domain detected; analysis stopped', { accountId, matches: badDomain.matches.map((m) => m.domain).join(',') });
    return { accountId, stage: 'STOPPED_BAD_DOMAIN', flags: { Bad_Domain: badDomain }, steps };
  }
  step({ name: 'bad_domain_check', status: 'SUCCEEDED' });

  const parentId = fieldText(account.ParentIdentifier);
  const hasShell = computeHasShell(accountId, parentId);
  step({ name: 'shell_check', status: 'SUCCEEDED', info: { hasShell } });

  const flags: ReadyFlags = {
    Bad_Domain: badDomain,
    Has_Shell: hasShell,
    Customer_Consistency: customerConsistency(account),
  };
  step({ name: 'consistency_scoring', status: 'SUCCEEDED', info: { score: flags.Customer_Consistency.score } });

  let shell: AccountRecord | null = null;
  if (hasShell) {
    shell = await resolveShell(parentId, deps, step);
    if (shell) {
      flags.Customer_Shell_Coherence = shellCoherence(account, shell);
      flags.Address_Consistency = addressConsistency(account, shell);
      step({ name: 'shell_coherence_scoring', status: 'SUCCEEDED', info: { score: flags.Customer_Shell_Coherence.score } });
    } else {
      step({ name: 'shell_coherence_scoring', status: 'SKIPPED', info: { reason: 'SHELL_UNRESOLVED' } });
    }
  } else {
    step({ name: 'shell_lookup', status: 'SKIPPED', info: { reason: parentId ? 'SELF_PARENT' : 'NO_PARENT' } });
  }

  let assessment: AiAssessment;
  try {
    assessment = await deps.judge.assess({ customer: account, shell: shell ?? undefined, flags });
    step({ name: 'ai_judgment', status: 'SUCCEEDED', info: { judge: deps.judge.name, confidence: assessment.confidence_score } });
  } catch (e) {
    logger.error('AI judgment failed', { accountId, judge: deps.judge.name, err: errorMessage(e) });
    assessment = errorAssessment(errorMessage(e));
    step({ name: 'ai_judgment', status: 'FAILED', info: { judge: deps.judge.name, error: errorMessage(e) } });
  }

  return { accountId, stage: 'PAYLOAD_READY', flags, ...(shell ? { shell } : {}), steps, assessment };
}
