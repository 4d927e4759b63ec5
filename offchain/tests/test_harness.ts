import { isRevert } from '../chain/errors';
import { serializeError } from '../util/serialize';

type TestFn = () => void | Promise<void>;

type TestCase = {
  name: string;
  fn: TestFn;
};

const tests: TestCase[] = [];

export function test(name: string, fn: TestFn): void {
  tests.push({ name, fn });
}

export function expect(condition: unknown, message: string): void {
  if (!condition) {
    throw new Error(message);
  }
}

export function expectEqual<T>(actual: T, expected: T, message?: string): void {
  if (actual !== expected) {
    throw new Error(message ?? `Expected ${String(expected)} but received ${String(actual)}`);
  }
}

/** Awaits `fn` and requires it to fail with a contract revert named `code`. */
export async function expectRevert(fn: () => Promise<unknown>, code: string): Promise<void> {
  try {
    await fn();
  } catch (err) {
    if (isRevert(err, code)) return;
    throw new Error(`Expected revert ${code} but received ${serializeError(err)}`);
  }
  throw new Error(`Expected revert ${code} but call succeeded`);
}

/** Like `expectRevert` for failures that are plain errors, matched on message. */
export async function expectThrows(fn: () => unknown, pattern: RegExp): Promise<void> {
  try {
    await fn();
  } catch (err) {
    const message = serializeError(err);
    if (pattern.test(message)) return;
    throw new Error(`Expected error matching ${pattern} but received ${message}`);
  }
  throw new Error(`Expected error matching ${pattern} but call succeeded`);
}

export async function runAll(): Promise<void> {
  let passed = 0;
  const failures: Array<{ name: string; error: Error }> = [];

  for (const { name, fn } of tests) {
    try {
      await fn();
      passed += 1;
      console.info(`✓ ${name}`);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      failures.push({ name, error });
      console.error(`✗ ${name}: ${error.message}`);
    }
  }

  console.info(`\n${passed} / ${tests.length} tests passed`);

  if (failures.length > 0) {
    console.error('\nFailures:');
    for (const failure of failures) {
      console.error(`- ${failure.name}: ${failure.error.stack ?? failure.error.message}`);
    }
    throw new Error(`${failures.length} test(s) failed`);
  }
}
