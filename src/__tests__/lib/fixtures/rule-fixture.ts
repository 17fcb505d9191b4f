import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

const TEST_DIR_PREFIX = 'rule-msg-finder-test-';

export const SSH_POLICY_RULE =
  'alert tcp any any -> any any (msg:"ET POLICY SSH Service";)\n';
export const HTTP_RULE =
  'alert tcp any any -> any any (msg:"Generic HTTP request";)\n';
export const SSH_LOGIN_RULE =
  'alert tcp any any -> any any (msg:"ssh SERVICE login attempt";)\n';

export const SCENARIO_RULES = [SSH_POLICY_RULE, HTTP_RULE, SSH_LOGIN_RULE];

/**
 * Build `count` rules; every third one mentions "Acme Portal" in its msg
 * field, with varying case.
 */
export function buildRuleSet(count: number): string[] {
  return Array.from({ length: count }, (_, i) => {
    const sid = 1000 + i;
    if (i % 3 === 0) {
      const name = i % 2 === 0 ? 'ACME portal' : 'acme Portal';
      return `alert http any any -> any any (msg:"Login to ${name} #${String(i)}"; sid:${String(sid)};)\n`;
    }
    return `alert udp any any -> any 53 (msg:"DNS query ${String(i)}"; sid:${String(sid)};)\n`;
  });
}

export async function createTempDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), TEST_DIR_PREFIX));
}

export async function writeRuleFile(
  dir: string,
  name: string,
  lines: readonly string[]
): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, lines.join(''), 'utf-8');
  return filePath;
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
