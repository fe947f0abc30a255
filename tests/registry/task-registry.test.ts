import { TaskRegistry } from '../../src/registry/task-registry';
import { TaskStatus } from '../../src/domain/task';
import { ServiceError } from '../../src/domain/errors';

const FIXED_NOW = new Date('2026-01-01T00:00:00.000Z');

describe('TaskRegistry', () => {
  let registry: TaskRegistry;

  beforeEach(() => {
    registry = new TaskRegistry(() => FIXED_NOW);
  });

  test('create registers a task as QUEUED', async () => {
    const task = await registry.create({ taskId: 't1', userId: 'alice', prompt: 'a cat' });
    expect(task).toEqual({
      taskId: 't1',
      userId: 'alice',
      prompt: 'a cat',
      status: TaskStatus.Queued,
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-01T00:00:00.000Z',
    });
    expect(registry.size).toBe(1);
  });

  test('create rejects a duplicate task id with TASK.CONFLICT', async () => {
    await registry.create({ taskId: 't1', userId: 'alice', prompt: 'a cat' });
    const attempt = registry.create({ taskId: 't1', userId: 'bob', prompt: 'a dog' });
    await expect(attempt).rejects.toBeInstanceOf(ServiceError);
    await expect(registry.create({ taskId: 't1', userId: 'bob', prompt: 'a dog' })).rejects.toMatchObject({
      typedError: { code: 'TASK.CONFLICT', taskId: 't1' },
    });
    expect(registry.get('t1')?.userId).toBe('alice');
  });

  test('get returns a copy', async () => {
    await registry.create({ taskId: 't1', userId: 'alice', prompt: 'a cat' });
    const copy = registry.get('t1');
    if (copy) copy.prompt = 'changed';
    expect(registry.get('t1')?.prompt).toBe('a cat');
  });

  test('get returns undefined for an unknown task', () => {
    expect(registry.get('missing')).toBeUndefined();
  });

  test('transition applies allowed moves and records the failure reason', async () => {
    await registry.create({ taskId: 't1', userId: 'alice', prompt: 'a cat' });
    const outcome = await registry.transition('t1', TaskStatus.Failed, 'download: HTTP 404');
    expect(outcome).toMatchObject({ applied: true, changed: true });
    expect(registry.get('t1')).toMatchObject({
      status: TaskStatus.Failed,
      failureReason: 'download: HTTP 404',
    });
  });

  test('transition refuses to leave a terminal state', async () => {
    await registry.create({ taskId: 't1', userId: 'alice', prompt: 'a cat' });
    await registry.transition('t1', TaskStatus.Failed, 'boom');
    const outcome = await registry.transition('t1', TaskStatus.QueuedForAi);
    expect(outcome.applied).toBe(false);
    if (!outcome.applied && outcome.reason === 'invalid-transition') {
      expect(outcome.error.code).toBe('TASK.INVALID_TRANSITION');
      expect(outcome.task.status).toBe(TaskStatus.Failed);
    } else {
      throw new Error('expected an invalid transition');
    }
    expect(registry.get('t1')?.status).toBe(TaskStatus.Failed);
  });

  test('transition to the current state is unchanged', async () => {
    await registry.create({ taskId: 't1', userId: 'alice', prompt: 'a cat' });
    await registry.transition('t1', TaskStatus.QueuedForAi);
    const outcome = await registry.transition('t1', TaskStatus.QueuedForAi);
    expect(outcome).toMatchObject({ applied: true, changed: false });
  });

  test('transition on an unknown task reports unknown-task', async () => {
    const outcome = await registry.transition('missing', TaskStatus.Failed);
    expect(outcome).toEqual({ applied: false, reason: 'unknown-task' });
  });

  test('updateStatus overwrites and clears the failure reason', async () => {
    await registry.create({ taskId: 't1', userId: 'alice', prompt: 'a cat' });
    await registry.updateStatus('t1', TaskStatus.Failed, 'boom');
    const task = await registry.updateStatus('t1', TaskStatus.QueuedForAi);
    expect(task?.status).toBe(TaskStatus.QueuedForAi);
    expect(task?.failureReason).toBeUndefined();
    expect(await registry.updateStatus('missing', TaskStatus.Failed)).toBeNull();
  });

  test('concurrent transitions on one task settle exactly once', async () => {
    await registry.create({ taskId: 't1', userId: 'alice', prompt: 'a cat' });
    const outcomes = await Promise.all([
      registry.transition('t1', TaskStatus.QueuedForAi),
      registry.transition('t1', TaskStatus.Failed, 'late failure'),
    ]);
    expect(outcomes[0]).toMatchObject({ applied: true, changed: true });
    expect(outcomes[1]).toMatchObject({ applied: false, reason: 'invalid-transition' });
    expect(registry.get('t1')?.status).toBe(TaskStatus.QueuedForAi);
  });

  test('many concurrent creates keep every task', async () => {
    const ids = Array.from({ length: 50 }, (_, i) => `t${i}`);
    await Promise.all(ids.map((taskId) => registry.create({ taskId, userId: 'alice', prompt: taskId })));
    expect(registry.size).toBe(50);
    expect(registry.get('t49')?.prompt).toBe('t49');
  });
});
