import { parseAmount } from './amount';
import { signingMessage, toTransactionJson } from './codec';
import { Hex, TransactionJson } from './types';
import { publicKeyOf, signMessage } from './utils/crypto';

/**
 * Build the JSON body a node accepts on /transactions/new, signed with
 * `privateKey`. The sender address is the uncompressed public key.
 */
export async function signTransaction(privateKey: Hex, recipient: string, amount: string | number): Promise<TransactionJson> {
  const units = parseAmount(amount);
  if (units === null) throw new Error(`invalid amount: ${amount}`);
  const tx = { sender: publicKeyOf(privateKey), recipient, amount: units };
  const signature = await signMessage(signingMessage(tx), privateKey);
  return toTransactionJson({ ...tx, signature });
}
