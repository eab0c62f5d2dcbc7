// Demo agents: each advertises a single capability and signs with its own Ed25519 key.

import type {
  ActionExecutor,
  Actor,
  CapabilityDisclosure,
  Contract,
  ContractAcceptance,
  Envelope,
  ExecutionRequest,
  ExecutionToken,
  IntentConstraints,
  IntentDeclaration,
  JsonObject,
  JsonValue,
} from '../core/types.js';
import type { Keypair } from '../core/crypto.js';
import { Ed25519Signer, generateId, generateKeypair } from '../core/crypto.js';
import { createEnvelope } from '../core/envelope.js';

const ICNP_VERSION = '1.0.0';

export class DemoAgent {
  readonly actor: Actor;
  readonly keypair: Keypair;
  readonly signer: Ed25519Signer;
  readonly capabilityId = generateId();

  constructor(
    readonly name: string,
    readonly action: string,
    private confidence = 0.8,
  ) {
    this.actor = { id: name.toLowerCase(), role: 'agent', display_name: name };
    this.keypair = generateKeypair();
    this.signer = new Ed25519Signer(this.keypair);
  }

  /** Whether this agent answers a broadcast asking for `action` */
  canPerform(action: string): boolean {
    return this.action === action;
  }

  capabilityMessage(sessionId: string, inReplyTo: string, recipient: Actor): Envelope<CapabilityDisclosure> {
    return createEnvelope({
      icnpVersion: ICNP_VERSION,
      type: 'capability_disclosure',
      sender: this.actor,
      recipient,
      sessionId,
      inReplyTo,
      payload: {
        capabilities: [{
          capability_id: this.capabilityId,
          name: `${this.name} capability`,
          description: `${this.name} can perform ${this.action}.`,
          actions: [{
            action: this.action,
            scopes: ['text'],
            requires_approval: false,
            confidence: this.confidence,
            effects: 'none',
          }],
        }],
      },
    });
  }

  /** Sign the canonical contract body and answer with an acceptance */
  async acceptanceMessage(
    sessionId: string,
    inReplyTo: string,
    contract: Contract,
    signingBytes: Uint8Array,
  ): Promise<Envelope<ContractAcceptance>> {
    return createEnvelope({
      icnpVersion: ICNP_VERSION,
      type: 'contract_acceptance',
      sender: this.actor,
      sessionId,
      inReplyTo,
      payload: {
        contract_id: contract.contract_id,
        decision: 'accept',
        signature: await this.signer.sign(signingBytes),
      },
    });
  }

  /** Produce the output of an authorised invocation; no external effects */
  perform(request: ExecutionRequest): JsonValue {
    const text = request.parameters.text;
    return { text: `[${this.name}] ${request.action}: ${typeof text === 'string' ? text : JSON.stringify(text)}` };
  }
}

/** Routes each authorised invocation to the agent named as executor */
export class DemoExecutor implements ActionExecutor {
  private agents = new Map<string, DemoAgent>();

  constructor(agents: DemoAgent[]) {
    for (const agent of agents) this.agents.set(agent.actor.id, agent);
  }

  async execute(request: ExecutionRequest): Promise<JsonValue> {
    const agent = this.agents.get(request.executor.id);
    if (!agent) throw new Error(`No demo agent ${request.executor.id}`);
    return agent.perform(request);
  }
}

export const DEMO_CONSTRAINTS: IntentConstraints = {
  risk_tolerance: 'low',
  human_approval_required: false,
  external_side_effects_allowed: false,
  audit_level: 'standard',
  data_policy: { allowed_data_classes: ['public'], retention_days: 0 },
};

export function intentMessage(
  sender: Actor,
  sessionId: string,
  goal: string,
  actions: string[],
  constraints: IntentConstraints = DEMO_CONSTRAINTS,
): Envelope<IntentDeclaration> {
  return createEnvelope({
    icnpVersion: ICNP_VERSION,
    type: 'intent_declaration',
    sender,
    sessionId,
    payload: {
      intent: { goal, requested_actions: actions.map(action => ({ action })), expected_outputs: ['text'] },
      constraints,
    },
  });
}

export function proposalMessage(sender: Actor, sessionId: string, contract: Contract, inReplyTo?: string): Envelope<{ contract: Contract }> {
  return createEnvelope({
    icnpVersion: ICNP_VERSION,
    type: 'contract_proposal',
    sender,
    sessionId,
    inReplyTo,
    payload: { contract },
  });
}

export function executionRequestMessage(
  sender: Actor,
  token: Readonly<ExecutionToken>,
  executor: Actor,
  action: string,
  parameters: JsonObject,
): Envelope<{ request: ExecutionRequest }> {
  return createEnvelope({
    icnpVersion: ICNP_VERSION,
    type: 'execution_request',
    sender,
    recipient: executor,
    sessionId: token.session_id,
    payload: {
      request: {
        invocation_id: generateId(),
        token_id: token.token_id,
        contract_id: token.contract_id,
        action,
        scope: 'text',
        executor,
        parameters,
        nonce: generateId(),
      },
    },
  });
}
