import { describe, expect, it } from 'vitest';
import { DuplicateHandlerError, UnknownJobTypeError } from './errors';
import { JobHandlerRegistry } from './handler-registry';
import { registerBuiltInHandlers } from './handlers';
import { success } from './types';
import type { JobHandler, JobType } from './types';

function handler(type: JobType): JobHandler {
  return { type, execute: async () => success() };
}

describe('JobHandlerRegistry', () => {
  it('resolves a registered handler', () => {
    const registry = new JobHandlerRegistry();
    const markCompleted = handler('mark-tasks-completed');
    registry.register(markCompleted);

    expect(registry.resolve('mark-tasks-completed')).toBe(markCompleted);
    expect(registry.has('mark-tasks-completed')).toBe(true);
    expect(registry.has('generate-task-list')).toBe(false);
  });

  it('rejects a second handler for the same type', () => {
    const registry = new JobHandlerRegistry().register(handler('generate-task-list'));
    expect(() => registry.register(handler('generate-task-list'))).toThrow(DuplicateHandlerError);
  });

  it('rejects registration under a type outside the enumeration', () => {
    const registry = new JobHandlerRegistry();
    const rogue = { type: 'send-email', execute: async () => success() };

    // A plain object can carry any string at runtime
    expect(() => registry.register(Object.assign(handler('cleanup-old-jobs'), rogue))).toThrow(
      'Unknown job type "send-email"'
    );
  });

  it('raises UnknownJobTypeError for an unknown type at dispatch', () => {
    const registry = new JobHandlerRegistry();
    expect(() => registry.resolve('NoSuchHandler')).toThrow(UnknownJobTypeError);
    expect(() => registry.resolve('mark-tasks-completed')).toThrow('Unknown job type "mark-tasks-completed"');
    expect(registry.has('NoSuchHandler')).toBe(false);
  });

  it('registers the built-in handlers', () => {
    const registry = registerBuiltInHandlers(new JobHandlerRegistry());
    expect(registry.types()).toEqual(['mark-tasks-completed', 'generate-task-list', 'cleanup-old-jobs']);
  });
});
