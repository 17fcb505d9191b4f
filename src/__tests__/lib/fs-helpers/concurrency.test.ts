import { expect, it } from 'vitest';

import { processInParallel } from '../../../lib/fs-helpers/concurrency.js';

it('processInParallel collects results tagged with their item index', async () => {
  const { results, errors } = await processInParallel(
    [3, 1, 2],
    async (value) => value * 10,
    2
  );
  expect(errors).toEqual([]);
  expect([...results].sort((a, b) => a.index - b.index)).toEqual([
    { index: 0, value: 30 },
    { index: 1, value: 10 },
    { index: 2, value: 20 },
  ]);
});

it('processInParallel isolates failures from sibling tasks', async () => {
  const { results, errors } = await processInParallel(
    ['ok', 'bad', 'ok'],
    async (value, index) => {
      if (value === 'bad') throw new Error(`item ${String(index)} failed`);
      return index;
    },
    3
  );
  expect(results.map((result) => result.value).sort()).toEqual([0, 2]);
  expect(errors).toHaveLength(1);
  expect(errors[0]?.index).toBe(1);
  expect(errors[0]?.error.message).toBe('item 1 failed');
});

it('processInParallel wraps non-Error rejections', async () => {
  const { errors } = await processInParallel(
    [1],
    async () => {
      throw 'plain string';
    },
    1
  );
  expect(errors[0]?.error.message).toBe('plain string');
});

it('processInParallel rejects an invalid concurrency', async () => {
  await expect(processInParallel([1], async (value) => value, 0)).rejects.toThrow(
    RangeError
  );
});

it('processInParallel rejects with an AbortError for an aborted signal', async () => {
  const controller = new AbortController();
  controller.abort();
  let calls = 0;
  await expect(
    processInParallel(
      [1, 2],
      async () => {
        calls++;
        return 0;
      },
      2,
      controller.signal
    )
  ).rejects.toMatchObject({ name: 'AbortError' });
  expect(calls).toBe(0);
});
