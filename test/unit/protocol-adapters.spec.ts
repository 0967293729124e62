import {
  A2aProtocolAdapter,
  McpProtocolAdapter,
  TaskStatus,
  WebhookValidationError,
} from '../../src';

describe('McpProtocolAdapter', () => {
  let adapter: McpProtocolAdapter;

  beforeEach(() => {
    adapter = new McpProtocolAdapter();
  });

  describe('parse', () => {
    it('should accept a minimal payload', () => {
      const payload = adapter.parse({
        task_id: 'task_123',
        status: 'working',
        timestamp: '2025-01-15T10:00:00Z',
      });

      expect(adapter.getTaskId(payload)).toBe('task_123');
      expect(adapter.getRawStatus(payload)).toBe('working');
    });

    it('should list every missing field', () => {
      let caught: unknown;
      try {
        adapter.parse({ status: 'completed' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(WebhookValidationError);
      if (!(caught instanceof WebhookValidationError)) return;
      expect(caught.message).toBe('Invalid MCP webhook payload');
      expect(caught.issues).toContain('task_id: task_id must be a string');
      expect(caught.issues).toContain(
        'timestamp: timestamp must be a valid ISO 8601 date string',
      );
    });

    it('should reject a result that is not an object', () => {
      expect(() =>
        adapter.parse({
          task_id: 'task_123',
          status: 'completed',
          timestamp: '2025-01-15T10:00:00Z',
          result: ['not', 'an', 'object'],
        }),
      ).toThrow(WebhookValidationError);
    });
  });

  describe('extract', () => {
    it('should read the result and metadata straight from the payload', () => {
      const payload = adapter.parse({
        task_id: 'task_123',
        status: 'input-required',
        timestamp: '2025-01-15T10:00:00Z',
        result: { errors: [{ message: 'Budget needs approval' }] },
        message: 'Waiting for approval',
        context_id: 'ctx_1',
      });

      expect(adapter.extract(payload, TaskStatus.NEEDS_INPUT)).toEqual({
        result: { errors: [{ message: 'Budget needs approval' }] },
        message: 'Waiting for approval',
        contextId: 'ctx_1',
        timestamp: '2025-01-15T10:00:00Z',
      });
    });

    it('should report absent fields as null', () => {
      const payload = adapter.parse({
        task_id: 'task_123',
        status: 'submitted',
        timestamp: '2025-01-15T10:00:00Z',
      });

      expect(adapter.extract(payload, TaskStatus.SUBMITTED)).toEqual({
        result: null,
        message: null,
        contextId: null,
        timestamp: '2025-01-15T10:00:00Z',
      });
    });
  });
});

describe('A2aProtocolAdapter', () => {
  let adapter: A2aProtocolAdapter;

  beforeEach(() => {
    adapter = new A2aProtocolAdapter();
  });

  describe('parse', () => {
    it('should read the task id from id', () => {
      const payload = adapter.parse({ id: 'task_1', status: { state: 'completed' } });
      expect(adapter.getTaskId(payload)).toBe('task_1');
      expect(adapter.getRawStatus(payload)).toBe('completed');
    });

    it('should accept task_id and taskId as the task id', () => {
      expect(
        adapter.getTaskId(adapter.parse({ task_id: 'task_2', status: { state: 'working' } })),
      ).toBe('task_2');
      expect(
        adapter.getTaskId(adapter.parse({ taskId: 'task_3', status: { state: 'working' } })),
      ).toBe('task_3');
    });

    it('should accept contextId as the context id', () => {
      const payload = adapter.parse({
        id: 'task_1',
        contextId: 'ctx_1',
        status: { state: 'working' },
      });

      expect(adapter.extract(payload, TaskStatus.WORKING).contextId).toBe('ctx_1');
    });

    it('should reject a payload without a task id', () => {
      expect(() => adapter.parse({ status: { state: 'completed' } })).toThrow(
        new WebhookValidationError('Invalid A2A webhook payload'),
      );
    });

    it('should reject a data part without an object', () => {
      let caught: unknown;
      try {
        adapter.parse({
          id: 'task_1',
          status: { state: 'completed' },
          artifacts: [{ parts: [{ kind: 'data', data: 'oops' }] }],
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(WebhookValidationError);
      if (!(caught instanceof WebhookValidationError)) return;
      expect(caught.issues).toEqual(['artifacts.0.parts.0.data: data must be an object']);
    });
  });

  describe('extract', () => {
    it('should read terminal results from artifacts', () => {
      const payload = adapter.parse({
        id: 'task_1',
        context_id: 'ctx_1',
        status: { state: 'completed', timestamp: '2025-01-15T10:00:00Z' },
        artifacts: [
          {
            artifact_id: 'task_1_result',
            parts: [
              { kind: 'text', text: 'done' },
              { kind: 'data', data: { products: [] } },
            ],
          },
        ],
      });

      expect(adapter.extract(payload, TaskStatus.COMPLETED)).toEqual({
        result: { products: [] },
        message: 'done',
        contextId: 'ctx_1',
        timestamp: '2025-01-15T10:00:00Z',
      });
    });

    it('should scan artifacts and parts in order', () => {
      const payload = adapter.parse({
        id: 'task_1',
        status: { state: 'failed' },
        artifacts: [
          { parts: [{ kind: 'file', metadata: { uri: 'https://cdn.example.com/a.png' } }] },
          {
            parts: [
              { kind: 'data', data: { errors: [{ message: 'first' }] } },
              { kind: 'data', data: { errors: [{ message: 'second' }] } },
              { kind: 'text', text: 'first text' },
            ],
          },
        ],
      });

      const extracted = adapter.extract(payload, TaskStatus.FAILED);

      expect(extracted.result).toEqual({ errors: [{ message: 'first' }] });
      expect(extracted.message).toBe('first text');
    });

    it('should report a terminal task without artifacts as having no result', () => {
      const payload = adapter.parse({ id: 'task_1', status: { state: 'completed' } });

      expect(adapter.extract(payload, TaskStatus.COMPLETED)).toEqual({
        result: null,
        message: null,
        contextId: null,
        timestamp: null,
      });
    });

    it('should fall back to artifacts for an in-progress task without a status message', () => {
      const payload = adapter.parse({
        id: 'task_1',
        status: { state: 'input-required' },
        artifacts: [
          {
            parts: [
              { kind: 'data', data: { errors: [{ message: 'Approval needed' }] } },
              { kind: 'text', text: 'Waiting on buyer' },
            ],
          },
        ],
      });

      expect(adapter.extract(payload, TaskStatus.NEEDS_INPUT)).toEqual({
        result: { errors: [{ message: 'Approval needed' }] },
        message: 'Waiting on buyer',
        contextId: null,
        timestamp: null,
      });
    });

    it('should read in-progress results from the status message', () => {
      const payload = adapter.parse({
        task_id: 'task_1',
        status: {
          state: 'input-required',
          message: {
            role: 'agent',
            parts: [
              { kind: 'data', data: { errors: [{ message: 'Budget needs approval' }] } },
              { kind: 'text', text: 'Approval needed' },
            ],
          },
        },
        artifacts: [{ parts: [{ kind: 'data', data: { stale: true } }] }],
      });

      const extracted = adapter.extract(payload, TaskStatus.NEEDS_INPUT);

      expect(extracted.result).toEqual({ errors: [{ message: 'Budget needs approval' }] });
      expect(extracted.message).toBe('Approval needed');
    });
  });
});
