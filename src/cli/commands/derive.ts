import { Command } from 'commander';
import { Keypair } from '../../keys/Keypair.js';
import { buildContext, type CliSession, type CommandContext, type GlobalOptions } from '../context.js';
import { parsePrivateKeyInput } from '../keyInput.js';
import { formatJson } from '../output.js';

export type DeriveOptions = {
  json?: boolean;
};

/** Print the public key for a hex or nsec private key. */
export async function runDerive(input: string, options: DeriveOptions, ctx: CommandContext): Promise<Keypair> {
  const keypair = Keypair.fromPrivateKey(parsePrivateKeyInput(input));
  const { publicKey } = keypair;
  ctx.stdout(
    options.json === true
      ? formatJson({ publicKey: { hex: publicKey.hex, bech32: publicKey.bech32 } })
      : `Public Key (hex):    ${publicKey.hex}\nPublic Key (bech32): ${publicKey.bech32}`,
  );
  return keypair;
}

export function createDeriveCommand(session: CliSession): Command {
  return new Command('derive')
    .description('Derive the public key of a private key (hex or nsec)')
    .argument('<private-key>', 'Private key in hex or nsec format')
    .option('-j, --json', 'Output in JSON format')
    .action(async (key: string, _options: DeriveOptions, command: Command) => {
      const options = command.optsWithGlobals<DeriveOptions & GlobalOptions>();
      await runDerive(key, options, await buildContext(options, session));
    });
}
