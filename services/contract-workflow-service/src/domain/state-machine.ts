import { InvalidTransitionError } from '@contractflow/shared';
import { ContractDocument, DocumentState } from './document';

/**
 * Forward edges of the document lifecycle. FAILED is reachable from every
 * non-terminal state and is added below rather than listed per row.
 */
const FORWARD: Record<DocumentState, readonly DocumentState[]> = {
  REQUESTED: ['DRAFTED'],
  DRAFTED: ['RENDERED'],
  RENDERED: ['SENT'],
  SENT: ['SIGNED', 'DECLINED'],
  SIGNED: ['INDEXED'],
  DECLINED: [],
  FAILED: [],
  INDEXED: [],
};

export const TERMINAL_STATES: readonly DocumentState[] = ['SIGNED', 'DECLINED', 'FAILED', 'INDEXED'];

export const ENVELOPE_STATES: readonly DocumentState[] = ['SENT', 'SIGNED', 'DECLINED', 'INDEXED'];

const RENDERED_STATES: readonly DocumentState[] = ['RENDERED', 'SENT', 'SIGNED', 'DECLINED', 'INDEXED'];

export const isTerminal = (state: DocumentState): boolean => TERMINAL_STATES.includes(state);

export function canTransition(from: DocumentState, to: DocumentState): boolean {
  if (to === 'FAILED') {
    return !isTerminal(from);
  }
  return FORWARD[from].includes(to);
}

export function assertTransition(from: DocumentState, to: DocumentState): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(`Transition ${from} -> ${to} is not allowed`);
  }
}

/**
 * Field invariants tied to the lifecycle state. Returns the list of
 * violations; an empty list means the record is consistent.
 */
export function checkInvariants(doc: ContractDocument): string[] {
  const violations: string[] = [];
  const hasEnvelope = doc.envelopeId !== null;
  if (hasEnvelope !== ENVELOPE_STATES.includes(doc.state)) {
    violations.push(`envelopeId ${hasEnvelope ? 'set' : 'missing'} in state ${doc.state}`);
  }
  if (RENDERED_STATES.includes(doc.state) && doc.renderedBlobRef === null) {
    violations.push(`renderedBlobRef missing in state ${doc.state}`);
  }
  if ((doc.state === 'REQUESTED' || doc.state === 'DRAFTED') && doc.renderedBlobRef !== null) {
    violations.push(`renderedBlobRef set in state ${doc.state}`);
  }
  if (doc.state !== 'REQUESTED' && doc.state !== 'FAILED' && doc.content === null) {
    violations.push(`content missing in state ${doc.state}`);
  }
  if ((doc.state === 'FAILED') !== (doc.failure !== null)) {
    violations.push(`failure record inconsistent with state ${doc.state}`);
  }
  return violations;
}
