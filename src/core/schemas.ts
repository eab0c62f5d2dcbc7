/**
 * JSON Schemas for the envelope and every payload the engine consumes.
 * Compiled once with ajv; each validator doubles as a type guard.
 */

import { Ajv } from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import type {
  Envelope,
  IntentDeclaration,
  CapabilityDisclosure,
  ContractProposal,
  ContractAcceptance,
  ContractRejection,
  ExecutionRequest,
  ExecutionResult,
  Result,
} from './types.js';

const ajv = new Ajv({ strict: false, allErrors: true });

const UUID_PATTERN = '^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$';
const RFC3339_PATTERN = '^\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}(\\.\\d+)?(Z|[+-]\\d{2}:\\d{2})$';

const uuid = { type: 'string', pattern: UUID_PATTERN };
const timestamp = { type: 'string', pattern: RFC3339_PATTERN };
const nonEmpty = { type: 'string', minLength: 1 };

const actor = {
  type: 'object',
  required: ['id', 'role'],
  properties: {
    id: nonEmpty,
    role: { enum: ['orchestrator', 'agent', 'tool', 'service', 'user'] },
    display_name: { type: 'string' },
  },
};

export const envelopeSchema = {
  type: 'object',
  required: ['icnp_version', 'type', 'phase', 'message_id', 'session_id', 'timestamp', 'sender', 'payload'],
  properties: {
    icnp_version: { type: 'string', pattern: '^\\d+\\.\\d+\\.\\d+$' },
    type: {
      enum: [
        'intent_declaration', 'capability_disclosure', 'contract_proposal', 'contract_counterproposal',
        'contract_acceptance', 'contract_rejection', 'execution_token', 'execution_request',
        'execution_result', 'audit_event', 'error',
      ],
    },
    phase: { enum: ['intent', 'capability', 'contract', 'token', 'execution', 'audit', 'error'] },
    message_id: uuid,
    session_id: uuid,
    timestamp,
    sender: actor,
    recipient: actor,
    in_reply_to: uuid,
    trace: { type: 'object' },
    payload: { type: 'object' },
    extensions: { type: 'object' },
  },
};

// Intent shape only; presence of goal and actions is left to the Intent Registry
export const intentDeclarationSchema = {
  type: 'object',
  required: ['intent', 'constraints'],
  properties: {
    intent: {
      type: 'object',
      properties: {
        goal: { type: 'string' },
        requested_actions: {
          type: 'array',
          items: {
            type: 'object',
            properties: { action: { type: 'string' }, description: { type: 'string' } },
          },
        },
        expected_outputs: { type: 'array', items: { type: 'string' } },
      },
    },
    constraints: {
      type: 'object',
      required: ['risk_tolerance', 'human_approval_required', 'external_side_effects_allowed', 'audit_level'],
      properties: {
        risk_tolerance: { enum: ['none', 'low', 'medium', 'high'] },
        human_approval_required: { type: 'boolean' },
        external_side_effects_allowed: { type: 'boolean' },
        audit_level: { enum: ['minimal', 'standard', 'detailed'] },
        data_policy: {
          type: 'object',
          required: ['allowed_data_classes', 'retention_days'],
          properties: {
            allowed_data_classes: { type: 'array', items: { type: 'string' } },
            retention_days: { type: 'integer', minimum: 0 },
          },
        },
      },
    },
  },
};

export const capabilityDisclosureSchema = {
  type: 'object',
  required: ['capabilities'],
  properties: {
    capabilities: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['capability_id', 'actions'],
        properties: {
          capability_id: nonEmpty,
          name: { type: 'string' },
          description: { type: 'string' },
          actions: {
            type: 'array',
            minItems: 1,
            items: {
              type: 'object',
              required: ['action', 'scopes', 'requires_approval', 'confidence', 'effects'],
              properties: {
                action: nonEmpty,
                scopes: { type: 'array', minItems: 1, items: nonEmpty },
                requires_approval: { type: 'boolean' },
                confidence: { type: 'number' },
                effects: { enum: ['none', 'read', 'write', 'external'] },
              },
            },
          },
        },
      },
    },
  },
};

const contract = {
  type: 'object',
  required: [
    'contract_id', 'session_id', 'issued_at', 'parties', 'agreed_actions', 'forbidden_actions',
    'constraints', 'enforcement', 'approvals', 'signatures',
  ],
  properties: {
    contract_id: nonEmpty,
    session_id: uuid,
    issued_at: timestamp,
    parties: { type: 'array', items: actor },
    agreed_actions: {
      type: 'array',
      items: {
        type: 'object',
        required: ['action_id', 'capability_id', 'executor_id', 'action', 'scope'],
        properties: {
          action_id: nonEmpty,
          capability_id: nonEmpty,
          executor_id: nonEmpty,
          action: nonEmpty,
          scope: nonEmpty,
          max_invocations: { type: 'integer', minimum: 1 },
        },
      },
    },
    forbidden_actions: {
      type: 'array',
      items: {
        type: 'object',
        required: ['action'],
        properties: { action: nonEmpty, scope: nonEmpty, reason: { type: 'string' } },
      },
    },
    constraints: { type: 'object' },
    enforcement: {
      type: 'object',
      required: ['mode', 'violation_action'],
      properties: {
        mode: { enum: ['strict', 'permissive', 'audit_only'] },
        violation_action: { enum: ['deny', 'abort', 'abort_and_rollback'] },
        audit_level: { enum: ['minimal', 'standard', 'detailed'] },
      },
    },
    approvals: {
      type: 'array',
      items: {
        type: 'object',
        required: ['approver_id', 'decision', 'timestamp'],
        properties: {
          approver_id: nonEmpty,
          decision: { enum: ['approve', 'reject'] },
          timestamp,
          reason: { type: 'string' },
        },
      },
    },
    signatures: { type: 'object', additionalProperties: { type: 'string' } },
  },
};

export const contractProposalSchema = {
  type: 'object',
  required: ['contract'],
  properties: { contract },
};

export const contractAcceptanceSchema = {
  type: 'object',
  required: ['contract_id', 'decision', 'signature'],
  properties: {
    contract_id: nonEmpty,
    decision: { const: 'accept' },
    signature: nonEmpty,
  },
};

export const contractRejectionSchema = {
  type: 'object',
  required: ['contract_id', 'reason'],
  properties: { contract_id: nonEmpty, reason: { type: 'string' } },
};

export const executionRequestSchema = {
  type: 'object',
  required: ['request'],
  properties: {
    request: {
      type: 'object',
      required: ['invocation_id', 'token_id', 'contract_id', 'action', 'executor', 'parameters'],
      properties: {
        invocation_id: nonEmpty,
        token_id: nonEmpty,
        contract_id: nonEmpty,
        action: nonEmpty,
        scope: nonEmpty,
        executor: actor,
        parameters: { type: 'object' },
        requested_at: timestamp,
        nonce: { type: 'string' },
      },
    },
  },
};

export const executionResultSchema = {
  type: 'object',
  required: ['result'],
  properties: {
    result: {
      type: 'object',
      required: ['invocation_id', 'token_id', 'contract_id', 'status'],
      properties: {
        invocation_id: nonEmpty,
        token_id: nonEmpty,
        contract_id: nonEmpty,
        status: { enum: ['success', 'failure', 'denied'] },
      },
    },
  },
};

// ── Compiled validators ──

export const validators = {
  envelope: ajv.compile<Envelope>(envelopeSchema),
  intentDeclaration: ajv.compile<IntentDeclaration>(intentDeclarationSchema),
  capabilityDisclosure: ajv.compile<CapabilityDisclosure>(capabilityDisclosureSchema),
  contractProposal: ajv.compile<ContractProposal>(contractProposalSchema),
  contractAcceptance: ajv.compile<ContractAcceptance>(contractAcceptanceSchema),
  contractRejection: ajv.compile<ContractRejection>(contractRejectionSchema),
  executionRequest: ajv.compile<{ request: ExecutionRequest }>(executionRequestSchema),
  executionResult: ajv.compile<{ result: ExecutionResult }>(executionResultSchema),
};

export function describeErrors(errors: ErrorObject[] | null | undefined): string {
  return ajv.errorsText(errors, { separator: '; ' });
}

/** Validate `value` against a compiled schema, reporting errors as one line */
export function check<T>(validate: ValidateFunction<T>, value: unknown): Result<T, string> {
  if (validate(value)) return { ok: true, value };
  return { ok: false, error: describeErrors(validate.errors) };
}
