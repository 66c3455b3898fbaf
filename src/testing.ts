import fs from 'fs';
import os from 'os';
import pathe from 'pathe';
import type { CommandOptions, CommandOutput, CommandRunner } from './command';
import { CommandError } from './errors';

export interface RecordedCommand {
  command: string;
  args: string[];
  cwd?: string;
}

export type CommandHandler = (
  call: RecordedCommand,
) => CommandOutput | void | Promise<CommandOutput | void>;

/**
 * In-process CommandRunner that records every call
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];

  constructor(private readonly handler: CommandHandler = () => undefined) {}

  async run(
    command: string,
    args: string[],
    options: CommandOptions = {},
  ): Promise<CommandOutput> {
    const call: RecordedCommand = { command, args, cwd: options.cwd };
    this.calls.push(call);
    const output = await this.handler(call);
    return output ?? { stdout: '', stderr: '' };
  }

  commandLines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(' '));
  }
}

export function failCommand(call: RecordedCommand, stderr = 'failed'): never {
  throw new CommandError([call.command, ...call.args].join(' '), 1, '', stderr);
}

export function makeTempDir(prefix = 'cursor-updater-test-'): string {
  return fs.mkdtempSync(pathe.join(os.tmpdir(), prefix));
}

export function writeFile(filePath: string, content: string): void {
  fs.mkdirSync(pathe.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
}

/**
 * A desktop entry carrying the installed version
 */
export function desktopEntry(version: string): string {
  return [
    '[Desktop Entry]',
    'Name=Cursor',
    'Exec=/opt/cursor/AppRun',
    `X-AppImage-Version=${version}`,
    '',
  ].join('\n');
}

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}
