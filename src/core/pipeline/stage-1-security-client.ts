/**
 * Pipeline Stage 1: Security client.
 *
 * Turns a credential choice into connection arguments. Each credential
 * operation reads its source once and is replaced by exactly one
 * `setConnectionArgs` carrying the host, registration id and scope plus
 * the credential material:
 *
 *   setSymmetricKeySecurityClient  → setConnectionArgs { ..., sasToken }
 *   setX509SecurityClient          → setConnectionArgs { ..., clientCertificate }
 *
 * Everything else passes through unchanged.
 */

import type { Operation, OperationOf } from '../../types/operations.js';
import type { CredentialSource } from '../../types/credentials.js';
import { createOperation } from './operations.js';
import { completeOp, delegate, passToNext } from './operation-flow.js';
import { toError } from '../pipeline-error.js';
import { PipelineStage } from './stage.js';

type CredentialOperation = OperationOf<'setSymmetricKeySecurityClient'> | OperationOf<'setX509SecurityClient'>;

export class UseSecurityClientStage extends PipelineStage {
  readonly name = 'security-client';

  protected override runOp(op: Operation): void {
    switch (op.kind) {
      case 'setSymmetricKeySecurityClient':
      case 'setX509SecurityClient':
        this.useSecurityClient(op);
        return;
      default:
        passToNext(this, op);
    }
  }

  private useSecurityClient(op: CredentialOperation): void {
    let replacement: Operation<'setConnectionArgs'>;
    try {
      replacement = this.connectionArgsFor(op);
    } catch (err: unknown) {
      this.logger.warn('credential source failed', { operation: op.id, kind: op.kind, error: toError(err) });
      completeOp(op, toError(err));
      return;
    }
    delegate(this, op, replacement);
  }

  private connectionArgsFor(op: CredentialOperation): Operation<'setConnectionArgs'> {
    switch (op.kind) {
      case 'setSymmetricKeySecurityClient': {
        const source = op.payload.securityClient;
        return createOperation('setConnectionArgs', {
          ...identityOf(source),
          sasToken: source.getCurrentToken(),
        });
      }
      case 'setX509SecurityClient': {
        const source = op.payload.securityClient;
        return createOperation('setConnectionArgs', {
          ...identityOf(source),
          clientCertificate: source.getCertificate(),
        });
      }
      default:
        return assertNever(op);
    }
  }
}

function identityOf(source: CredentialSource): {
  provisioningHost: string;
  registrationId: string;
  idScope: string;
} {
  return {
    provisioningHost: source.getHost(),
    registrationId: source.getRegistrationId(),
    idScope: source.getScope(),
  };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled credential operation: ${JSON.stringify(value)}`);
}
