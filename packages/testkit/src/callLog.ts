/**
 * packages/testkit/src/callLog.ts — Ordered record of callback invocations.
 *
 * Tests hand `log.fn("name")` to the code under test wherever a callback is
 * expected, then assert on `log.entries()` to check both which callbacks ran and
 * in what order.
 */

export type CallLog = Readonly<{
  /** Returns a callback that appends `label` (and the mapped first argument, if a mapper is given). */
  fn: <A extends unknown[]>(label: string, describeArg?: (...args: A) => string) => (...args: A) => void;
  push: (entry: string) => void;
  entries: () => readonly string[];
  clear: () => void;
}>;

export function createCallLog(): CallLog {
  const items: string[] = [];
  return Object.freeze({
    fn:
      <A extends unknown[]>(label: string, describeArg?: (...args: A) => string) =>
      (...args: A): void => {
        items.push(describeArg ? `${label}:${describeArg(...args)}` : label);
      },
    push: (entry: string) => {
      items.push(entry);
    },
    entries: () => items.slice(),
    clear: () => {
      items.length = 0;
    },
  });
}
