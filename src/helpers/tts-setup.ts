import { spawn } from 'child_process';
import { Translator } from '../types';
import { logger } from '../utils/logger';

export const TTS_INSTALL_COMMAND = 'sudo apt-get update && sudo apt-get install -y espeak-ng';

export type ShellRunner = (command: string) => Promise<number>;

export const runInShell: ShellRunner = command =>
  new Promise((resolve, reject) => {
    const child = spawn(command, { shell: true, stdio: 'inherit' });
    child.once('error', reject);
    child.once('close', code => resolve(code ?? 1));
  });

/**
 * Print how to install a speech engine (Debian/Ubuntu), or run the install.
 * Resolves with the installer's exit code, or 0 when only instructions were printed.
 */
export async function setupTts(
  install: boolean,
  translator: Translator,
  write: (line: string) => void,
  runner: ShellRunner = runInShell
): Promise<number> {
  if (!install) {
    write(translator.t('TTS_SETUP_INSTRUCTIONS'));
    write(`  ${TTS_INSTALL_COMMAND}`);
    return 0;
  }

  write(translator.t('TTS_SETUP_INSTALLING'));
  const code = await runner(TTS_INSTALL_COMMAND);
  if (code !== 0) {
    logger.warn(`TTS install command exited with code ${code}`);
  }
  return code;
}
