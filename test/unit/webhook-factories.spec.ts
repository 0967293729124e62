import {
  A2aProtocolAdapter,
  TaskStatus,
  createA2aWebhookPayload,
  createMcpWebhookPayload,
} from '../../src';

describe('createMcpWebhookPayload', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should only include the required fields by default', () => {
    const payload = createMcpWebhookPayload({
      taskId: 'task_123',
      taskType: 'get_products',
      status: TaskStatus.WORKING,
      timestamp: '2025-01-15T10:00:00Z',
    });

    expect(payload).toEqual({
      task_id: 'task_123',
      task_type: 'get_products',
      status: 'working',
      timestamp: '2025-01-15T10:00:00Z',
    });
    expect(Object.keys(payload)).toEqual(['task_id', 'task_type', 'status', 'timestamp']);
  });

  it('should include every optional field that was given', () => {
    const payload = createMcpWebhookPayload({
      taskId: 'task_456',
      taskType: 'create_media_buy',
      status: TaskStatus.FAILED,
      timestamp: new Date('2025-01-15T10:00:00Z'),
      result: { errors: [{ code: 'INVALID_INPUT', message: 'Budget too low' }] },
      operationId: 'op_1',
      message: 'Validation failed',
      contextId: 'ctx_1',
      domain: 'media-buy',
    });

    expect(payload).toEqual({
      task_id: 'task_456',
      task_type: 'create_media_buy',
      status: 'failed',
      timestamp: '2025-01-15T10:00:00.000Z',
      result: { errors: [{ code: 'INVALID_INPUT', message: 'Budget too low' }] },
      operation_id: 'op_1',
      message: 'Validation failed',
      context_id: 'ctx_1',
      domain: 'media-buy',
    });
  });

  it('should write input-required with a hyphen', () => {
    const payload = createMcpWebhookPayload({
      taskId: 'task_1',
      taskType: 'create_media_buy',
      status: TaskStatus.NEEDS_INPUT,
      timestamp: '2025-01-15T10:00:00Z',
    });

    expect(payload.status).toBe('input-required');
  });

  it('should default the timestamp to the current time', () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2025-03-01T12:30:00.000Z'));

    const payload = createMcpWebhookPayload({
      taskId: 'task_1',
      taskType: 'get_products',
      status: TaskStatus.SUBMITTED,
    });

    expect(payload.timestamp).toBe('2025-03-01T12:30:00.000Z');
  });
});

describe('createA2aWebhookPayload', () => {
  it('should build a Task with an artifact for completed tasks', () => {
    const payload = createA2aWebhookPayload({
      taskId: 'task_123',
      status: TaskStatus.COMPLETED,
      contextId: 'ctx_1',
      timestamp: '2025-01-15T10:00:00Z',
      result: { products: [] },
      message: 'Found 0 products',
    });

    expect(payload).toEqual({
      kind: 'task',
      id: 'task_123',
      context_id: 'ctx_1',
      status: { state: 'completed', timestamp: '2025-01-15T10:00:00Z' },
      artifacts: [
        {
          artifact_id: 'task_123_result',
          parts: [
            { kind: 'data', data: { products: [] } },
            { kind: 'text', text: 'Found 0 products' },
          ],
        },
      ],
    });
  });

  it('should leave artifacts empty for a failed task without content', () => {
    const payload = createA2aWebhookPayload({
      taskId: 'task_9',
      status: TaskStatus.FAILED,
      contextId: 'ctx_1',
      timestamp: '2025-01-15T10:00:00Z',
    });

    expect(payload.artifacts).toEqual([]);
    expect(payload.kind).toBe('task');
  });

  it('should build a status update for in-progress tasks', () => {
    const payload = createA2aWebhookPayload({
      taskId: 'task_7',
      status: TaskStatus.NEEDS_INPUT,
      contextId: 'ctx_2',
      timestamp: '2025-01-15T10:00:00Z',
      message: 'Budget needs approval',
    });

    expect(payload).toEqual({
      kind: 'status-update',
      task_id: 'task_7',
      context_id: 'ctx_2',
      status: {
        state: 'input-required',
        timestamp: '2025-01-15T10:00:00Z',
        message: {
          message_id: 'task_7_msg',
          role: 'agent',
          parts: [{ kind: 'text', text: 'Budget needs approval' }],
        },
      },
      final: false,
    });
  });

  it('should omit the status message when there is nothing to send', () => {
    const payload = createA2aWebhookPayload({
      taskId: 'task_7',
      status: TaskStatus.WORKING,
      contextId: 'ctx_2',
      timestamp: '2025-01-15T10:00:00Z',
    });

    expect(payload.status).toEqual({ state: 'working', timestamp: '2025-01-15T10:00:00Z' });
  });

  it('should produce bodies the A2A adapter reads back', () => {
    const adapter = new A2aProtocolAdapter();
    const payload = adapter.parse(
      createA2aWebhookPayload({
        taskId: 'task_7',
        status: TaskStatus.WORKING,
        contextId: 'ctx_2',
        timestamp: '2025-01-15T10:00:00Z',
        result: { progress: 40 },
      }),
    );

    expect(adapter.getTaskId(payload)).toBe('task_7');
    expect(adapter.extract(payload, TaskStatus.WORKING)).toEqual({
      result: { progress: 40 },
      message: null,
      contextId: 'ctx_2',
      timestamp: '2025-01-15T10:00:00Z',
    });
  });
});
