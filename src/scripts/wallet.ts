#!/usr/bin/env node
import { generateKeyPair } from '../utils/crypto';
import { signTransaction } from '../wallet';

const USAGE = `usage:
  tallychain-wallet keygen
  tallychain-wallet sign <privateKeyHex> <recipient> <amount>`;

async function main(argv: string[]) {
  const [cmd, ...args] = argv;
  if (cmd === 'keygen') {
    console.log(JSON.stringify(generateKeyPair(), null, 2));
    return;
  }
  if (cmd === 'sign' && args.length === 3) {
    const [priv, recipient, amount] = args;
    console.log(JSON.stringify(await signTransaction(priv, recipient, amount), null, 2));
    return;
  }
  console.error(USAGE);
  process.exitCode = 2;
}

main(process.argv.slice(2)).catch(e => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
