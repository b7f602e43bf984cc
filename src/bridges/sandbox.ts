import { spawn } from 'child_process';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { SafetyError } from '../workflow/errors.js';
import type { SandboxConfigDeclaration } from '../workflow/schema.js';
import type { SandboxCapability, SandboxLimits, SandboxResult } from './capabilities.js';

export type SandboxPreset = 'low' | 'medium' | 'high' | 'max';

export const SANDBOX_PRESETS: Record<SandboxPreset, SandboxLimits> = {
  low: { timeoutMs: 60000, memoryMb: 1024 },
  medium: { timeoutMs: 30000, memoryMb: 512 },
  high: { timeoutMs: 10000, memoryMb: 256 },
  max: { timeoutMs: 5000, memoryMb: 128 },
};

export function resolveSandboxLimits(config: SandboxConfigDeclaration | undefined): SandboxLimits {
  const preset = SANDBOX_PRESETS[config?.preset ?? 'medium'];
  return {
    timeoutMs: config?.timeout !== undefined ? config.timeout * 1000 : preset.timeoutMs,
    memoryMb: preset.memoryMb,
  };
}

const BLOCKED_PATTERNS: Array<{ pattern: RegExp; reason: string }> = [
  { pattern: /\brequire\s*\(/, reason: 'module loading is not allowed' },
  { pattern: /\bimport\s*\(|^\s*import\s/m, reason: 'module loading is not allowed' },
  { pattern: /\bprocess\s*\./, reason: 'process access is not allowed' },
  { pattern: /\bglobalThis\b/, reason: 'global object access is not allowed' },
  { pattern: /\beval\s*\(|\bFunction\s*\(/, reason: 'dynamic code evaluation is not allowed' },
  { pattern: /__proto__|\bconstructor\s*\[/, reason: 'prototype access is not allowed' },
];

/** Reject code that reaches for capabilities the sandbox does not grant. */
export function screenCode(code: string): void {
  for (const { pattern, reason } of BLOCKED_PATTERNS) {
    const match = pattern.exec(code);
    if (match) {
      const start = Math.max(0, match.index - 20);
      throw new SafetyError(`Unsafe code: ${reason}`, code.slice(start, match.index + match[0].length + 20).trim());
    }
  }
}

const RESULT_MARKER = '__FLOWGRAPH_SANDBOX_RESULT__';

const RESERVED = new Set([
  'arguments', 'await', 'bindings', 'break', 'case', 'catch', 'class', 'console', 'const', 'continue',
  'debugger', 'default', 'delete', 'do', 'else', 'enum', 'eval', 'export', 'extends', 'false',
  'finally', 'for', 'function', 'if', 'implements', 'import', 'in', 'instanceof', 'interface', 'let',
  'new', 'null', 'package', 'private', 'protected', 'public', 'return', 'static', 'super', 'switch',
  'this', 'throw', 'true', 'try', 'typeof', 'var', 'void', 'while', 'with', 'yield',
]);

/** Binding names that can be declared as strict-mode parameters. */
export function bindableNames(bindings: Record<string, unknown>): string[] {
  return Object.keys(bindings).filter((name) => /^[a-zA-Z_$][a-zA-Z0-9_$]*$/.test(name) && !RESERVED.has(name));
}

/**
 * Script evaluated inside the isolated context. Bindings arrive as a JSON
 * string and are parsed there, so no object from the host realm is reachable
 * from user code. The outcome is left on the context global as a string.
 */
export function composeSandboxScript(code: string, names: string[]): string {
  return `'use strict';
(async () => {
  const lines = [];
  const format = (value) => (typeof value === 'string' ? value : JSON.stringify(value));
  const console = Object.freeze({
    log: (...values) => { lines.push(values.map(format).join(' ')); },
    error: (...values) => { lines.push(values.map(format).join(' ')); },
  });
  const bindings = JSON.parse(payload);
  const block = async function (bindings, console${names.map((name) => `, ${name}`).join('')}) {
'use strict';
${code}
  };
  try {
    const output = await block(bindings, console${names.map((name) => `, bindings[${JSON.stringify(name)}]`).join('')});
    globalThis.outcome = JSON.stringify({ ok: true, output: output === undefined ? null : output, stdout: lines.join('\\n') });
  } catch (error) {
    const name = error instanceof Error ? error.name : 'Error';
    const message = error instanceof Error ? error.message : String(error);
    globalThis.outcome = JSON.stringify({ ok: false, name, error: message });
  }
})();
`;
}

// Host side of the child. User code runs in a fresh vm context with string
// code generation disabled; the host never hands it a function.
const RUNNER = `
const vm = require('vm');
let input = '';
process.stdin.setEncoding('utf8');
process.stdin.on('data', (chunk) => { input += chunk; });
process.stdin.on('end', () => {
  const emit = (text) => process.stdout.write('\\n${RESULT_MARKER}' + text);
  const { source, payload, timeoutMs } = JSON.parse(input);
  const sandbox = Object.create(null);
  sandbox.payload = payload;
  try {
    const context = vm.createContext(sandbox, { codeGeneration: { strings: false, wasm: false } });
    new vm.Script(source, { filename: 'code-node.js' }).runInContext(context, { timeout: timeoutMs });
  } catch (error) {
    const timedOut = error && error.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT';
    emit(JSON.stringify({ ok: false, name: timedOut ? 'TimeoutError' : 'SyntaxError', error: timedOut ? 'timed out' : String(error && error.message) }));
    return;
  }
  setImmediate(() => {
    const outcome = Object.getOwnPropertyDescriptor(sandbox, 'outcome');
    emit(outcome && typeof outcome.value === 'string' ? outcome.value : JSON.stringify({ ok: false, name: 'Error', error: 'code block never settled' }));
  });
});
`;

const runnerResultSchema = z.union([
  z.object({ ok: z.literal(true), output: z.unknown(), stdout: z.string().default('') }),
  z.object({ ok: z.literal(false), name: z.string(), error: z.string() }),
]);

/**
 * Runs JavaScript code blocks in a separate Node.js process with a memory cap,
 * a kill timeout and an empty environment. Inside that process the block runs
 * in strict mode in its own vm context that holds nothing but its bindings.
 * The block's return value is the node output; state fields and inputs are in
 * scope by name and as `bindings`, and `console.log` lines come back as stdout.
 */
export class SubprocessSandbox implements SandboxCapability {
  constructor(private readonly nodeCommand: string = process.execPath) {}

  async run(
    code: string,
    bindings: Record<string, unknown>,
    limits: SandboxLimits,
    signal?: AbortSignal,
  ): Promise<SandboxResult> {
    screenCode(code);
    const source = composeSandboxScript(code, bindableNames(bindings));
    const exceeded = (): SafetyError =>
      new SafetyError(`Code execution exceeded ${limits.timeoutMs}ms or ${limits.memoryMb}MB`);

    return new Promise((resolve, reject) => {
      const proc = spawn(this.nodeCommand, [`--max-old-space-size=${limits.memoryMb}`, '-e', RUNNER], {
        stdio: ['pipe', 'pipe', 'pipe'],
        env: {},
        timeout: limits.timeoutMs,
        killSignal: 'SIGKILL',
        signal,
      });

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('error', (error) => {
        // An abort surfaces here first; the child is reported once it has exited.
        if (signal?.aborted) return;
        logger.error(`Sandbox process failed to start: ${error.message}`);
        reject(error);
      });

      proc.on('close', (exitCode, killedBy) => {
        if (signal?.aborted) {
          reject(new Error('Sandbox run was cancelled'));
          return;
        }
        const markerAt = stdout.lastIndexOf(RESULT_MARKER);
        if (markerAt < 0) {
          reject(
            killedBy === 'SIGKILL'
              ? exceeded()
              : new Error(`Sandbox exited with code ${exitCode ?? 'null'}: ${stderr.trim()}`),
          );
          return;
        }
        let parsed: z.infer<typeof runnerResultSchema>;
        try {
          parsed = runnerResultSchema.parse(JSON.parse(stdout.slice(markerAt + RESULT_MARKER.length)));
        } catch (error) {
          reject(new Error(`Sandbox returned malformed output: ${error instanceof Error ? error.message : String(error)}`));
          return;
        }
        if (!parsed.ok) {
          if (parsed.name === 'TimeoutError') {
            reject(exceeded());
          } else if (parsed.name === 'EvalError') {
            reject(new SafetyError('Unsafe code: dynamic code evaluation is not allowed', parsed.error));
          } else {
            reject(new Error(`Code raised: ${parsed.error}`));
          }
          return;
        }
        resolve({ output: parsed.output, stdout: parsed.stdout, stderr });
      });

      proc.stdin.end(JSON.stringify({ source, payload: JSON.stringify(bindings), timeoutMs: limits.timeoutMs }));
    });
  }
}
