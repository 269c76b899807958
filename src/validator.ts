import { formatAmount, parseAmount } from './amount';
import { signingMessage } from './codec';
import { ValidationError } from './errors';
import { Result, SYSTEM_SENDER, Transaction, TransactionRequest } from './types';
import { verifySignature } from './utils/crypto';

/** The slice of ledger state a solvency check needs. */
export interface LedgerView {
  spendableBalance(address: string): bigint;
}

function reject(error: ValidationError): Result<Transaction, ValidationError> {
  return { ok: false, error };
}

export class TransactionValidator {
  /**
   * Checks amount, signature and solvency, in that order, and returns the
   * normalized transaction. Does not touch ledger state.
   *
   * A `"system"` sender passes unconditionally; keeping such transactions
   * away from external callers is the Ledger's job.
   */
  validate(request: TransactionRequest, view: LedgerView): Result<Transaction, ValidationError> {
    const amount = parseAmount(request.amount);
    if (amount === null) {
      return reject(new ValidationError('InvalidAmount', `amount ${String(request.amount)} is not a non-negative 8-decimal value`));
    }
    const { sender, recipient, signature } = request;
    if (typeof recipient !== 'string' || recipient.length === 0) {
      return reject(new ValidationError('InvalidAddress', 'recipient is required'));
    }
    if (sender === SYSTEM_SENDER) {
      return { ok: true, value: { sender, recipient, amount } };
    }
    if (typeof sender !== 'string' || sender.length === 0) {
      return reject(new ValidationError('InvalidSignature', 'sender public key is required'));
    }
    if (typeof signature !== 'string' || signature.length === 0) {
      return reject(new ValidationError('InvalidSignature', 'signature is required'));
    }

    const tx: Transaction = { sender, recipient, amount, signature };
    if (!verifySignature(signingMessage(tx), signature, sender)) {
      return reject(new ValidationError('InvalidSignature', 'signature does not verify against sender'));
    }

    const available = view.spendableBalance(sender);
    if (available < amount) {
      return reject(new ValidationError(
        'InsufficientBalance',
        `balance ${formatAmount(available)} is below ${formatAmount(amount)}`,
      ));
    }
    return { ok: true, value: tx };
  }
}
