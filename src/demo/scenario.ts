#!/usr/bin/env npx tsx
// ICNP Demo Scenario — broadcast an intent, let the matching agent negotiate and execute.
// Usage: npx tsx src/demo/scenario.ts

import { pathToFileURL } from 'node:url';
import type { Actor, AuditKind, ExecutionResult, SessionPhase } from '../core/types.js';
import type { EngineOutcome } from '../engine.js';
import { NegotiationEngine } from '../engine.js';
import { Ed25519Verifier, generateId } from '../core/crypto.js';
import { MemoryAuditSink } from '../storage/memory.js';
import { check, validators } from '../core/schemas.js';
import { LogLevel, setGlobalLogLevel } from '../core/logger.js';
import {
  DemoAgent,
  DemoExecutor,
  executionRequestMessage,
  intentMessage,
  proposalMessage,
} from './agents.js';

export interface ScenarioReport {
  sessionId: string;
  /** Agents that answered the broadcast */
  responders: string[];
  tokenId: string;
  results: ExecutionResult[];
  /** ICNP code of the denied forbidden request */
  deniedCode: string;
  finalPhase: SessionPhase;
  auditKinds: AuditKind[];
}

function resultOf(outcome: EngineOutcome): ExecutionResult | undefined {
  for (const reply of outcome.replies) {
    const parsed = check(validators.executionResult, reply.payload);
    if (reply.type === 'execution_result' && parsed.ok) return parsed.value.result;
  }
  return undefined;
}

function expectAccepted(outcome: EngineOutcome, step: string): void {
  if (outcome.status !== 'accepted') {
    throw new Error(`${step} was ${outcome.status}: ${outcome.error?.message ?? 'no reason'}`);
  }
}

/** Run one complete negotiation and return what happened */
export async function runScenario(text = 'ICNP binds every execution to a negotiated contract.'): Promise<ScenarioReport> {
  const orchestrator: Actor = { id: 'orchestrator', role: 'orchestrator', display_name: 'Orchestrator' };
  const agents = [
    new DemoAgent('Summarizer', 'summarize', 0.9),
    new DemoAgent('Translator', 'translate'),
    new DemoAgent('Classifier', 'classify'),
  ];

  const verifier = new Ed25519Verifier();
  for (const agent of agents) verifier.register(agent.actor.id, agent.keypair.publicKey);
  const sink = new MemoryAuditSink();
  const engine = new NegotiationEngine({}, { verifier, executor: new DemoExecutor(agents), sink });

  // 1. Intent, broadcast to every agent
  const sessionId = generateId();
  const intent = intentMessage(orchestrator, sessionId, 'Summarise a short text', ['summarize']);
  expectAccepted(await engine.receive(intent), 'intent');

  // 2. Only agents offering the requested action disclose
  const responders = agents.filter(a => a.canPerform('summarize'));
  for (const agent of responders) {
    expectAccepted(await engine.receive(agent.capabilityMessage(sessionId, intent.message_id, orchestrator)), 'disclosure');
  }

  // 3. Contract drafted from the ledger, with a forbidden action
  const draft = await engine.draftContract(sessionId, {
    forbidden: [{ action: 'delete', scope: 'any', reason: 'No destructive actions in this session' }],
  });
  if (!draft.ok) throw draft.error;
  const proposal = proposalMessage(orchestrator, sessionId, draft.value, intent.message_id);
  expectAccepted(await engine.receive(proposal), 'proposal');

  // 4. Every executor signs; the last signature releases the token
  const bytes = engine.negotiator.signingBytes(draft.value);
  const executors = new Set(draft.value.agreed_actions.map(a => a.executor_id));
  for (const agent of responders.filter(a => executors.has(a.actor.id))) {
    const acceptance = await agent.acceptanceMessage(sessionId, proposal.message_id, draft.value, bytes);
    expectAccepted(await engine.receive(acceptance), 'acceptance');
  }
  const tokenId = engine.getSession(sessionId)?.tokenId;
  const token = tokenId ? engine.issuer.resolve(tokenId) : undefined;
  if (!token) throw new Error('No execution token was issued');

  // 5. Governed execution: one allowed request, one forbidden
  const executor = responders[0].actor;
  const allowed = await engine.receive(executionRequestMessage(orchestrator, token, executor, 'summarize', { text }));
  const forbidden = await engine.receive(executionRequestMessage(orchestrator, token, executor, 'delete', { text }));

  const completed = await engine.completeSession(sessionId);
  if (!completed.ok) throw completed.error;

  const results = [resultOf(allowed)].filter((r): r is ExecutionResult => r !== undefined);
  const events = await sink.list({ sessionId });
  return {
    sessionId,
    responders: responders.map(a => a.actor.id),
    tokenId: token.token_id,
    results,
    deniedCode: forbidden.error?.code ?? 'none',
    finalPhase: engine.getSession(sessionId)?.phase ?? 'aborted',
    auditKinds: events.map(e => e.kind),
  };
}

// ═══════════════════════════════════════════
// CLI
// ═══════════════════════════════════════════

function banner(title: string): void {
  console.log('\n' + '═'.repeat(60));
  console.log(`  ${title}`);
  console.log('═'.repeat(60));
}

async function main(): Promise<void> {
  setGlobalLogLevel(LogLevel.WARN);
  banner('ICNP — Broadcast Negotiation Demo');
  const report = await runScenario();

  console.log(`  Session:     ${report.sessionId}`);
  console.log(`  Responders:  ${report.responders.join(', ')}`);
  console.log(`  Token:       ${report.tokenId}`);
  for (const result of report.results) {
    console.log(`  Result:      ${result.status} ${JSON.stringify(result.output)}`);
  }
  console.log(`  Forbidden:   denied with ${report.deniedCode}`);
  console.log(`  Final phase: ${report.finalPhase}`);

  banner('Audit Trail');
  report.auditKinds.forEach((kind, i) => console.log(`  ${String(i + 1).padStart(2)}. ${kind}`));
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch(err => {
    console.error('Demo failed:', err);
    process.exit(1);
  });
}
