import { CallbackIngestor } from '../../src/ingest/callback-ingestor';
import { TaskRegistry } from '../../src/registry/task-registry';
import { MemoryObjectStorage } from '../../src/storage/memory-storage';
import { MemoryJobQueue } from '../../src/queue/memory-queue';
import { JobQueue } from '../../src/queue/job-queue';
import { JobFanoutProducer } from '../../src/queue/producer';
import { StatusReconciler } from '../../src/status/reconciler';
import { TaskStatus } from '../../src/domain/task';
import { ServiceError, storageError } from '../../src/domain/errors';
import { LogEntry, LogLevel, resetLogHandler, setLogHandler } from '../../src/logger';

const RESULT_URL = 'https://cdn.test/results/t1.mp4';

function directPayload(taskId: string, urls: string[] = [RESULT_URL]) {
  return { code: 200, msg: 'success', data: { taskId, info: { resultUrls: urls } } };
}

class BrokenStorage extends MemoryObjectStorage {
  async putFile(key: string): Promise<void> {
    throw new ServiceError(storageError('put', key, 'bucket missing'));
  }
}

class SecondPushFails implements JobQueue {
  readonly pushed: string[] = [];

  async push(message: string): Promise<void> {
    if (this.pushed.length === 1) throw new Error('connection lost');
    this.pushed.push(message);
  }

  async close(): Promise<void> {}
}

describe('CallbackIngestor', () => {
  let registry: TaskRegistry;
  let storage: MemoryObjectStorage;
  let queue: MemoryJobQueue;
  let fetchFn: jest.Mock<Promise<Response>, [string, RequestInit]>;
  let logs: LogEntry[];

  function createIngestor(overrides: { storage?: MemoryObjectStorage; queue?: JobQueue } = {}) {
    return new CallbackIngestor({
      registry,
      storage: overrides.storage ?? storage,
      producer: new JobFanoutProducer(overrides.queue ?? queue),
      downloadTimeoutMs: 1000,
      fetchFn,
    });
  }

  beforeEach(async () => {
    registry = new TaskRegistry();
    storage = new MemoryObjectStorage();
    queue = new MemoryJobQueue();
    fetchFn = jest.fn<Promise<Response>, [string, RequestInit]>(async () =>
      new Response('fake-video-bytes', { status: 200 }),
    );
    logs = [];
    setLogHandler((entry) => logs.push(entry));
    await registry.create({ taskId: 't1', userId: 'alice', prompt: 'a cat surfing' });
  });

  afterEach(() => {
    resetLogHandler();
  });

  test('stores the original, enqueues both variants and marks QUEUED_FOR_AI', async () => {
    const outcome = await createIngestor().ingest(directPayload('t1'));

    expect(outcome.kind).toBe('queued');
    if (outcome.kind === 'queued') {
      expect(outcome.inputKey).toBe('alice/t1.mp4');
      expect(outcome.jobs.map((job) => job.variant)).toEqual(['v1', 'v2']);
    }
    expect(fetchFn.mock.calls[0][0]).toBe(RESULT_URL);
    expect(storage.keys()).toEqual(['alice/t1.mp4']);
    expect(queue.messages().map((message) => JSON.parse(message).output_key)).toEqual([
      'alice/t1_processed.mp4',
      'alice/t1_processed_v2.mp4',
    ]);
    expect(registry.get('t1')?.status).toBe(TaskStatus.QueuedForAi);
  });

  test('reads the embedded result encoding', async () => {
    const outcome = await createIngestor().ingest({
      code: 200,
      data: {
        taskId: 't1',
        state: 'success',
        resultJson: JSON.stringify({ resultUrls: ['https://cdn.test/embedded.mp4'] }),
      },
    });

    expect(outcome.kind).toBe('queued');
    expect(fetchFn.mock.calls[0][0]).toBe('https://cdn.test/embedded.mp4');
  });

  test('unknown task ids are ignored without side effects', async () => {
    const outcome = await createIngestor().ingest(directPayload('ghost'));

    expect(outcome).toEqual({ kind: 'ignored', reason: 'unknown-task', taskId: 'ghost' });
    expect(fetchFn).not.toHaveBeenCalled();
    expect(storage.keys()).toEqual([]);
    expect(queue.length).toBe(0);
    expect(registry.get('ghost')).toBeUndefined();
  });

  test('payloads without a task id are ignored', async () => {
    expect(await createIngestor().ingest({ code: 200, data: {} })).toEqual({
      kind: 'ignored',
      reason: 'missing-task-id',
      taskId: null,
    });
    expect(await createIngestor().ingest(undefined)).toEqual({
      kind: 'ignored',
      reason: 'missing-task-id',
      taskId: null,
    });
  });

  test('an empty result list marks the task FAILED', async () => {
    const outcome = await createIngestor().ingest({
      code: 200,
      data: { taskId: 't1', resultJson: '{"resultUrls":[]}' },
    });

    expect(outcome).toEqual({
      kind: 'failed',
      taskId: 't1',
      stage: 'callback',
      reason: 'result URL list is empty',
    });
    expect(registry.get('t1')).toMatchObject({
      status: TaskStatus.Failed,
      failureReason: 'result URL list is empty',
    });
    expect(fetchFn).not.toHaveBeenCalled();
    expect(queue.length).toBe(0);
  });

  test('a provider failure code marks the task FAILED', async () => {
    const outcome = await createIngestor().ingest({ code: 501, msg: 'failed', data: { taskId: 't1', state: 'fail' } });

    expect(outcome).toMatchObject({ kind: 'failed', stage: 'callback', reason: 'provider reported code 501' });
    expect(registry.get('t1')?.status).toBe(TaskStatus.Failed);
  });

  test('a failed download marks the task FAILED and stores nothing', async () => {
    fetchFn.mockImplementation(async () => new Response('gone', { status: 404 }));

    const outcome = await createIngestor().ingest(directPayload('t1'));

    expect(outcome).toEqual({
      kind: 'failed',
      taskId: 't1',
      stage: 'download',
      reason: 'Asset download returned HTTP 404',
    });
    expect(registry.get('t1')?.failureReason).toBe('download: Asset download returned HTTP 404');
    expect(storage.keys()).toEqual([]);
    expect(queue.length).toBe(0);
    const failure = logs.find((entry) => entry.message === 'Callback ingestion failed');
    expect(failure?.level).toBe(LogLevel.Error);
    expect(failure?.context).toMatchObject({ taskId: 't1', stage: 'download' });
  });

  test('a failed upload marks the task FAILED and publishes nothing', async () => {
    const outcome = await createIngestor({ storage: new BrokenStorage() }).ingest(directPayload('t1'));

    expect(outcome).toEqual({
      kind: 'failed',
      taskId: 't1',
      stage: 'persist',
      reason: 'Object storage put failed for alice/t1.mp4: bucket missing',
    });
    expect(registry.get('t1')?.status).toBe(TaskStatus.Failed);
    expect(queue.length).toBe(0);
  });

  test('a failed second publish marks the task FAILED with the first job already out', async () => {
    const flaky = new SecondPushFails();
    const outcome = await createIngestor({ queue: flaky }).ingest(directPayload('t1'));

    expect(outcome).toEqual({
      kind: 'failed',
      taskId: 't1',
      stage: 'publish',
      reason: 'Could not enqueue v2 job: connection lost',
    });
    expect(flaky.pushed).toHaveLength(1);
    expect(storage.keys()).toEqual(['alice/t1.mp4']);
    expect(registry.get('t1')?.status).toBe(TaskStatus.Failed);
  });

  test('a redelivered callback is processed again', async () => {
    const ingestor = createIngestor();
    await ingestor.ingest(directPayload('t1'));
    const second = await ingestor.ingest(directPayload('t1'));

    expect(second.kind).toBe('queued');
    expect(queue.length).toBe(4);
    expect(storage.keys()).toEqual(['alice/t1.mp4']);
    expect(registry.get('t1')?.status).toBe(TaskStatus.QueuedForAi);
  });

  test('a late success for a FAILED task is ignored without side effects', async () => {
    const ingestor = createIngestor();
    await ingestor.ingest({ code: 500, data: { taskId: 't1' } });
    const outcome = await ingestor.ingest(directPayload('t1'));

    expect(outcome).toEqual({ kind: 'ignored', reason: 'already-failed', taskId: 't1' });
    expect(registry.get('t1')?.status).toBe(TaskStatus.Failed);
    expect(fetchFn).not.toHaveBeenCalled();
    expect(storage.keys()).toEqual([]);
    expect(queue.length).toBe(0);
  });

  test('side fields set to null do not hide the task id', async () => {
    const outcome = await createIngestor().ingest({
      code: null,
      msg: null,
      data: { taskId: 't1', state: null, failMsg: null, info: { resultUrls: [RESULT_URL] } },
    });

    expect(outcome.kind).toBe('queued');
    expect(storage.keys()).toEqual(['alice/t1.mp4']);
    expect(queue.length).toBe(2);
    expect(registry.get('t1')?.status).toBe(TaskStatus.QueuedForAi);
  });

  test('a null msg on a known task is still ingested', async () => {
    const outcome = await createIngestor().ingest({
      code: 200,
      msg: null,
      data: { taskId: 't1', info: { resultUrls: [RESULT_URL] } },
    });

    expect(outcome).toMatchObject({ kind: 'queued', taskId: 't1', inputKey: 'alice/t1.mp4' });
  });

  test('a result-less callback reads FAILED with no artifacts stored', async () => {
    await createIngestor().ingest({ code: 200, data: { taskId: 't1' } });

    const reconciler = new StatusReconciler(storage, registry);
    expect(await reconciler.status('t1', 'alice')).toEqual({ taskId: 't1', status: TaskStatus.Failed });
    expect(storage.keys()).toEqual([]);
  });
});
