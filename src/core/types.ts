/**
 * ICNP Core Types
 * Single source of truth for envelopes, protocol documents and engine state.
 *
 * Wire documents keep the protocol's snake_case field names; engine-internal
 * types use camelCase.
 */

// ── Result Type ──

/** Discriminated union result type for error handling without exceptions */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ── JSON ──

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ── Actors ──

export type ActorRole = 'orchestrator' | 'agent' | 'tool' | 'service' | 'user';

export interface Actor {
  id: string;
  role: ActorRole;
  display_name?: string;
}

// ── Envelope ──

export type MessageType =
  | 'intent_declaration'
  | 'capability_disclosure'
  | 'contract_proposal'
  | 'contract_counterproposal'
  | 'contract_acceptance'
  | 'contract_rejection'
  | 'execution_token'
  | 'execution_request'
  | 'execution_result'
  | 'audit_event'
  | 'error';

/** Phase label carried on the wire. `audit` and `error` are envelope-only labels. */
export type EnvelopePhase = 'intent' | 'capability' | 'contract' | 'token' | 'execution' | 'audit' | 'error';

export interface Envelope<P extends object = JsonObject> {
  icnp_version: string;
  type: MessageType;
  phase: EnvelopePhase;
  /** UUID, unique within the session */
  message_id: string;
  session_id: string;
  /** RFC 3339 */
  timestamp: string;
  sender: Actor;
  recipient?: Actor;
  in_reply_to?: string;
  trace?: JsonObject;
  payload: P;
  /** Opaque pass-through data; relayed untouched, never interpreted */
  extensions?: JsonObject;
}

// ── Intent ──

export type RiskTolerance = 'none' | 'low' | 'medium' | 'high';
export type AuditLevel = 'minimal' | 'standard' | 'detailed';

export interface RequestedAction {
  action: string;
  description?: string;
}

export interface Intent {
  goal: string;
  requested_actions: RequestedAction[];
  expected_outputs?: string[];
}

export interface DataPolicy {
  allowed_data_classes: string[];
  retention_days: number;
}

export interface IntentConstraints {
  risk_tolerance: RiskTolerance;
  human_approval_required: boolean;
  data_policy?: DataPolicy;
  external_side_effects_allowed: boolean;
  audit_level: AuditLevel;
}

/** Payload of an `intent_declaration` message */
export interface IntentDeclaration {
  intent: Intent;
  constraints: IntentConstraints;
}

// ── Capability ──

export type ActionEffects = 'none' | 'read' | 'write' | 'external';

export interface CapabilityAction {
  action: string;
  scopes: string[];
  requires_approval: boolean;
  /** 0..1 */
  confidence: number;
  effects: ActionEffects;
}

export interface Capability {
  capability_id: string;
  /** Participant that disclosed the capability; filled from the envelope sender */
  owner_id: string;
  name?: string;
  description?: string;
  actions: CapabilityAction[];
}

/** Payload of a `capability_disclosure` message */
export interface CapabilityDisclosure {
  capabilities: Omit<Capability, 'owner_id'>[];
}

// ── Contract ──

export type EnforcementMode = 'strict' | 'permissive' | 'audit_only';
export type ViolationAction = 'deny' | 'abort' | 'abort_and_rollback';

export interface AgreedAction {
  action_id: string;
  capability_id: string;
  executor_id: string;
  action: string;
  scope: string;
  max_invocations?: number;
}

export interface ForbiddenAction {
  action: string;
  /** Absent, `any` or `*` forbids every scope */
  scope?: string;
  reason?: string;
}

export interface Enforcement {
  mode: EnforcementMode;
  violation_action: ViolationAction;
  audit_level?: AuditLevel;
}

export interface Approval {
  approver_id: string;
  decision: 'approve' | 'reject';
  timestamp: string;
  reason?: string;
}

export interface Contract {
  contract_id: string;
  session_id: string;
  issued_at: string;
  parties: Actor[];
  agreed_actions: AgreedAction[];
  forbidden_actions: ForbiddenAction[];
  constraints: Partial<IntentConstraints>;
  enforcement: Enforcement;
  approvals: Approval[];
  /** participant id → signature over the canonical contract body */
  signatures: Record<string, string>;
}

/** Contract fields covered by participant signatures */
export type ContractBody = Omit<Contract, 'signatures'>;

/** Payload of `contract_proposal` / `contract_counterproposal` */
export interface ContractProposal {
  contract: Contract;
}

/** Payload of `contract_acceptance` */
export interface ContractAcceptance {
  contract_id: string;
  decision: 'accept';
  signature: string;
}

/** Payload of `contract_rejection` */
export interface ContractRejection {
  contract_id: string;
  reason: string;
}

// ── Execution Token ──

export interface BindingHash {
  alg: string;
  value: string;
}

export interface TokenBinding {
  intent_hash: BindingHash;
  contract_hash: BindingHash;
  capabilities_hash: BindingHash;
}

export interface TokenLimits {
  max_invocations_per_actor: number;
  max_invocations_total?: number;
}

export interface TokenSignature {
  alg: string;
  key_id: string;
  value: string;
  signed_at: string;
}

export interface ExecutionToken {
  token_id: string;
  session_id: string;
  contract_id: string;
  issuer: Actor;
  audience: Actor[];
  issued_at: string;
  validity: { not_before: string; not_after: string };
  limits: TokenLimits;
  binding: TokenBinding;
  signature: TokenSignature;
}

/** Token fields covered by the issuer signature */
export type TokenBody = Omit<ExecutionToken, 'signature'>;

// ── Execution ──

export interface ExecutionRequest {
  invocation_id: string;
  token_id: string;
  contract_id: string;
  action: string;
  scope?: string;
  executor: Actor;
  parameters: JsonObject;
  requested_at?: string;
  nonce?: string;
}

export type ExecutionStatus = 'success' | 'failure' | 'denied';

export interface ExecutionResult {
  invocation_id: string;
  token_id: string;
  contract_id: string;
  status: ExecutionStatus;
  started_at?: string;
  ended_at?: string;
  output?: JsonValue;
  error?: { code: string; message: string };
  /** Violations tolerated under permissive / audit_only enforcement */
  violations?: string[];
}

// ── Audit ──

export type AuditKind =
  | 'intent_recorded'
  | 'capability_disclosed'
  | 'contract_proposed'
  | 'contract_signed'
  | 'contract_accepted'
  | 'contract_rejected'
  | 'token_issued'
  | 'token_revoked'
  | 'execution_started'
  | 'execution_completed'
  | 'execution_failed'
  | 'violation'
  | 'rollback'
  | 'phase_transition'
  | 'session_expired'
  | 'message_recorded'
  | 'rejected';

export type AuditSeverity = 'info' | 'warning' | 'critical';

export interface AuditEvent {
  /** Global, monotonically increasing; assigned by the audit log */
  sequence: number;
  event_id: string;
  kind: AuditKind;
  session_id: string | null;
  subject_ids: string[];
  related_message_id?: string;
  timestamp: string;
  severity: AuditSeverity;
  details: JsonObject;
}

/** Audit event before the log assigns sequence, id and timestamp */
export type AuditEventInput = Omit<AuditEvent, 'sequence' | 'event_id' | 'timestamp' | 'severity'> & {
  severity?: AuditSeverity;
};

// ── Session ──

export type SessionPhase =
  | 'intent'
  | 'capability'
  | 'contract'
  | 'token'
  | 'execution'
  | 'completed'
  | 'aborted'
  | 'expired';

export type TerminalPhase = 'completed' | 'aborted' | 'expired';

export interface PhaseChange {
  from: SessionPhase;
  to: SessionPhase;
}

/** Read-only view of a session handed out by the store */
export interface SessionSnapshot {
  id: string;
  phase: SessionPhase;
  initiator: Actor;
  participants: Actor[];
  createdAt: string;
  closedAt?: string;
  seenMessageIds: string[];
  intentRecorded: boolean;
  capabilityIds: string[];
  contractId?: string;
  contractAccepted: boolean;
  tokenId?: string;
}

// ── Collaborators ──

/** Rollback executor, invoked only under strict + abort_and_rollback */
export interface RollbackExecutor {
  rollback(invocationId: string): Promise<Result<void, string>>;
}

/** Performs the governed action itself; agent decision logic lives behind this */
export interface ActionExecutor {
  execute(request: ExecutionRequest): Promise<JsonValue>;
}

/** Durable destination for audit events */
export interface AuditSink {
  append(event: AuditEvent): Promise<void>;
}

export interface AuditFilter {
  sessionId?: string;
  kind?: AuditKind;
  /** Only events with a greater sequence */
  afterSequence?: number;
}

/** Sink that can also read back what it stored, in sequence order */
export interface AuditStore extends AuditSink {
  list(filter?: AuditFilter): Promise<AuditEvent[]>;
}
