import { describe, it, expect } from 'vitest';
import vm from 'node:vm';
import { executeTest, ASYNC_PROCEDURE_MESSAGE } from '../src/executor/index.js';
import { classifyThrown } from '../src/executor/errors.js';
import { FailureSignal } from '../src/framework/failure.js';

describe('classifyThrown', () => {
  it('treats FailureSignal as a failed assertion', () => {
    expect(classifyThrown(new FailureSignal('reason', 4))).toEqual({
      outcome: 'fail',
      message: 'Line \u001b[1m4\u001b[0m: reason',
    });
  });

  it('treats other errors as unexpected exceptions', () => {
    expect(classifyThrown(new SyntaxError('bad token'))).toEqual({
      outcome: 'exception',
      message: 'Unexpected SyntaxError: bad token',
    });
  });

  it('recognizes errors created in another realm', () => {
    const foreign: unknown = vm.runInNewContext('new RangeError("far away")');
    expect(foreign instanceof Error).toBe(false);
    expect(classifyThrown(foreign)).toEqual({
      outcome: 'exception',
      message: 'Unexpected RangeError: far away',
    });
  });

  it('treats everything else as unrecognized', () => {
    for (const thrown of ['text', 42, null, undefined, { message: 'looks like an error' }]) {
      expect(classifyThrown(thrown)).toEqual({
        outcome: 'unrecognized',
        message: 'Totally unknown error was thrown!',
      });
    }
  });
});

describe('executeTest', () => {
  it('returns a passing result when the body returns', () => {
    const result = executeTest({ name: 'ok', procedure: () => {} });
    expect(result.name).toBe('ok');
    expect(result.outcome).toBe('pass');
    expect(result.message).toBeUndefined();
  });

  it('contains whatever the body throws', () => {
    const result = executeTest({
      name: 'bad',
      procedure: () => {
        throw 7;
      },
    });
    expect(result).toMatchObject({ name: 'bad', outcome: 'unrecognized', message: 'Totally unknown error was thrown!' });
    expect(result.duration).toBeGreaterThanOrEqual(0);
  });

  it('rejects a body that returns a promise, even a resolved one', () => {
    const result = executeTest({ name: 'resolved', procedure: () => Promise.resolve() });
    expect(result).toMatchObject({
      name: 'resolved',
      outcome: 'exception',
      message: `Unexpected Error: ${ASYNC_PROCEDURE_MESSAGE}`,
    });
  });

  it('handles the rejection of an async body', async () => {
    const result = executeTest({
      name: 'rejected',
      procedure: async () => {
        throw new Error('late');
      },
    });
    expect(result.outcome).toBe('exception');
    // An unhandled rejection would fail the suite once the microtask queue drains
    await new Promise(resolve => setTimeout(resolve, 0));
  });
});
