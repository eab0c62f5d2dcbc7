/**
 * ICNP Engine — negotiation, token issuance and governed execution for
 * multi-party agent sessions.
 *
 * @packageDocumentation
 */

// ── Core Types ──
export type {
  Result,
  JsonValue,
  JsonObject,
  ActorRole,
  Actor,
  MessageType,
  EnvelopePhase,
  Envelope,
  RiskTolerance,
  AuditLevel,
  RequestedAction,
  Intent,
  DataPolicy,
  IntentConstraints,
  IntentDeclaration,
  ActionEffects,
  CapabilityAction,
  Capability,
  CapabilityDisclosure,
  EnforcementMode,
  ViolationAction,
  AgreedAction,
  ForbiddenAction,
  Enforcement,
  Approval,
  Contract,
  ContractBody,
  ContractProposal,
  ContractAcceptance,
  ContractRejection,
  BindingHash,
  TokenBinding,
  TokenLimits,
  TokenSignature,
  ExecutionToken,
  TokenBody,
  ExecutionRequest,
  ExecutionStatus,
  ExecutionResult,
  AuditKind,
  AuditSeverity,
  AuditEvent,
  AuditEventInput,
  AuditFilter,
  AuditSink,
  AuditStore,
  SessionPhase,
  TerminalPhase,
  PhaseChange,
  SessionSnapshot,
  RollbackExecutor,
  ActionExecutor,
} from './core/types.js';

// ── Engine ──
export { NegotiationEngine } from './engine.js';
export type { EngineDeps, EngineOutcome, OutcomeStatus } from './engine.js';

// ── Errors ──
export { ProtocolError, ERROR_CODES, fail, ok, toError, toProtocolError } from './core/errors.js';
export type { ErrorKind, ErrorCode } from './core/errors.js';

// ── Configuration ──
export { DEFAULT_ENGINE_CONFIG, resolveConfig } from './core/config.js';
export type { EngineConfig } from './core/config.js';

// ── Envelope ──
export {
  validateEnvelope,
  admit,
  createEnvelope,
  createErrorEnvelope,
  phaseForType,
} from './core/envelope.js';
export type { MessageLedger, Admission, EnvelopeParams, ErrorPayload } from './core/envelope.js';

// ── Session ──
export { SessionStore, PHASE_TRANSITIONS, canTransition, isTerminal } from './core/session.js';
export type { NextPhase, TransitionTarget, SessionEntry, InvocationCounters, SessionStoreConfig } from './core/session.js';
export { KeyedMutex } from './core/mutex.js';

// ── Intent & Capabilities ──
export { validateIntent, recordIntent, requestedActionNames } from './core/intent.js';
export {
  CapabilityLedger,
  ExactActionScorer,
  WILDCARD_SCOPES,
  discloseCapabilities,
  findOfferedAction,
  rankCapabilities,
  scopeCovers,
} from './core/capability.js';
export type { CapabilityScorer, RankedCapability, Disclosed } from './core/capability.js';

// ── Contract ──
export {
  ContractNegotiator,
  approvalRequired,
  authorizedActions,
  checkApprovals,
  contractBody,
  effectiveAuthorizations,
  findForbidden,
  forbiddenCovers,
  isAuthorized,
  requiredSigners,
} from './core/contract.js';
export type { DraftOptions, NegotiatorDeps } from './core/contract.js';

// ── Token ──
export { TokenIssuer } from './core/token.js';
export type { TokenIssuerDeps, IssueOptions, InvocationCounts } from './core/token.js';
export { InMemoryRevocationList, createRevocationEntry } from './core/revocation.js';
export type { RevocationEntry, RevocationListInterface } from './core/revocation.js';

// ── Enforcement ──
export { EnforcementGate, DryRunExecutor } from './core/enforcement.js';
export type { GateDeps, GateOutcome } from './core/enforcement.js';

// ── Audit ──
export { AuditLog, AUDIT_KINDS, isAuditKind, isAuditSeverity, matchesFilter } from './core/audit.js';
export { MemoryAuditSink } from './storage/memory.js';
export { SqliteAuditSink } from './storage/sqlite.js';

// ── Crypto ──
export {
  BINDING_HASH_ALG,
  Ed25519Signer,
  Ed25519Verifier,
  JcsCanonicalizer,
  bindingHash,
  blake2b256,
  canonicalize,
  fromBase64url,
  generateId,
  generateKeypair,
  signObject,
  toBase64url,
  toHex,
  verifyObjectSignature,
} from './core/crypto.js';
export type { Canonicalizer, Keypair, Signer, Verifier } from './core/crypto.js';

// ── Collaborators ──
export {
  CircuitBreaker,
  CircuitOpenError,
  CollaboratorGuard,
  CollaboratorTimeoutError,
  withTimeout,
} from './core/collaborator.js';
export type { CircuitBreakerConfig, CircuitState, StateChangeCallback } from './core/collaborator.js';

// ── Schemas ──
export { validators, check, describeErrors } from './core/schemas.js';

// ── Logging & Metrics ──
export {
  LogLevel,
  createLogger,
  setGlobalLogLevel,
  getGlobalLogLevel,
  setLogOutput,
  resetLogOutput,
  parseLogLevel,
  JsonLogger,
} from './core/logger.js';
export type { Logger, LogEntry, LogContext } from './core/logger.js';
export { MetricsCollector } from './core/metrics.js';
export type { MetricsAdapter, MetricsSnapshot, Tags } from './core/metrics.js';

// ── Immutability helpers ──
export { deepFreeze, frozenCopy } from './core/immutable.js';
