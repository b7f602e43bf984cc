import { describe, expect, it } from 'vitest';
import { SafetyError } from '../workflow/errors.js';
import { bindableNames, resolveSandboxLimits, screenCode, SubprocessSandbox } from './sandbox.js';

describe('resolveSandboxLimits', () => {
  it('defaults to the medium preset', () => {
    expect(resolveSandboxLimits(undefined)).toEqual({ timeoutMs: 30000, memoryMb: 512 });
  });

  it('lets an explicit timeout in seconds override the preset', () => {
    expect(resolveSandboxLimits({ preset: 'max', timeout: 2 })).toEqual({ timeoutMs: 2000, memoryMb: 128 });
    expect(resolveSandboxLimits({ preset: 'low' })).toEqual({ timeoutMs: 60000, memoryMb: 1024 });
  });
});

describe('screenCode', () => {
  it('accepts plain computation', () => {
    expect(() => screenCode('const words = text.split(" ");\nreturn words.length;')).not.toThrow();
  });

  it.each([
    ["const fs = require('fs');", 'module loading'],
    ["import fs from 'fs';", 'module loading'],
    ["const m = await import('fs');", 'module loading'],
    ['return process.env;', 'process access'],
    ['return globalThis;', 'global object access'],
    ["return eval('1 + 1');", 'dynamic code evaluation'],
    ["return new Function('return 1')();", 'dynamic code evaluation'],
    ['return ({}).__proto__;', 'prototype access'],
  ])('rejects %s', (code, reason) => {
    expect(() => screenCode(code)).toThrow(SafetyError);
    expect(() => screenCode(code)).toThrow(`Unsafe code: ${reason}`);
  });
});

describe('SubprocessSandbox', () => {
  const sandbox = new SubprocessSandbox();
  const limits = { timeoutMs: 5000, memoryMb: 128 };

  it('returns the value of the code block', async () => {
    const result = await sandbox.run('return [1, 2, 3].map((n) => n * 2);', {}, limits);

    expect(result.output).toEqual([2, 4, 6]);
  });

  it('binds state fields by name and as bindings', async () => {
    const result = await sandbox.run(
      'console.log("counting", text.length);\nreturn text.split(" ").length + bindings.extra;',
      { text: 'one two three', extra: 10 },
      limits,
    );

    expect(result.output).toBe(13);
    expect(result.stdout).toBe('counting 13');
  });

  it('reports an error thrown by the block', async () => {
    await expect(sandbox.run("throw new Error('boom');", {}, limits)).rejects.toThrow('Code raised: boom');
  });

  it('stops a block that runs past its timeout', async () => {
    await expect(sandbox.run('while (true) {}', {}, { timeoutMs: 500, memoryMb: 128 })).rejects.toBeInstanceOf(
      SafetyError,
    );
  });

  it('gives plain functions no global object to reach through', async () => {
    const escape = "return (function () { return this; })()['req' + 'uire']('child_process').execSync('echo hi').toString();";

    await expect(sandbox.run(escape, {}, limits)).rejects.toThrow(
      "Code raised: Cannot read properties of undefined (reading 'require')",
    );
  });

  it('refuses to build functions from strings', async () => {
    const escape = "return bindings.constructor.constructor('return this')()['req' + 'uire']('fs').readdirSync('/');";

    const error = await sandbox.run(escape, {}, limits).then(
      () => undefined,
      (reason: unknown) => reason,
    );

    expect(error).toBeInstanceOf(SafetyError);
    expect(error instanceof SafetyError ? error.message : '').toBe('Unsafe code: dynamic code evaluation is not allowed');
  });

  it('has no module loader or process in scope', async () => {
    const result = await sandbox.run('return [typeof require, typeof process, typeof module];', {}, limits);

    expect(result.output).toEqual(['undefined', 'undefined', 'undefined']);
  });

  it('kills the child when its signal aborts', async () => {
    const controller = new AbortController();
    const running = sandbox.run('while (true) {}', {}, { timeoutMs: 20000, memoryMb: 128 }, controller.signal);
    setTimeout(() => controller.abort(), 200);
    const startedAt = Date.now();

    await expect(running).rejects.toThrow('Sandbox run was cancelled');
    expect(Date.now() - startedAt).toBeLessThan(5000);
  });
});

describe('bindableNames', () => {
  it('keeps identifiers that can be strict-mode parameters', () => {
    expect(bindableNames({ text: 1, 'bad-name': 2, eval: 3, class: 4, bindings: 5, $ok: 6 })).toEqual(['text', '$ok']);
  });
});
