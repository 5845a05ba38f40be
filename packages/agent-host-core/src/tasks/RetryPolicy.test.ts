import { expect } from 'chai';

import { retryDelay, shouldRetry } from './RetryPolicy.js';
import type { RetryPolicy } from '../config/HostConfig.js';
import type { TaskOutcome, TaskStatus } from '../plugin-engine/types.js';
import type { ErrorCode } from '../errors.js';

const POLICY: RetryPolicy = { maxAttempts: 3, backoffMs: 500, multiplier: 2, maxBackoffMs: 1500 };

function outcome(status: TaskStatus, code?: ErrorCode, attempt: number = 1): TaskOutcome {
    return {
        taskId: 'task-1',
        type: 'quote',
        plugin: 'pricing',
        status,
        error: code ? { code, message: code } : undefined,
        durationMs: 5,
        executionMs: 5,
        completedAt: 0,
        attempt,
    };
}

describe('shouldRetry', () => {
    it('should retry transient failures', () => {
        expect(shouldRetry(outcome('failed', 'UpstreamUnavailable'), POLICY)).to.equal(true);
        expect(shouldRetry(outcome('failed', 'InternalFault'), POLICY)).to.equal(true);
        expect(shouldRetry(outcome('timed_out', 'Timeout'), POLICY)).to.equal(true);
    });

    it('should not retry invalid payloads or cancellations', () => {
        expect(shouldRetry(outcome('failed', 'InvalidPayload'), POLICY)).to.equal(false);
        expect(shouldRetry(outcome('failed', 'Cancelled'), POLICY)).to.equal(false);
        expect(shouldRetry(outcome('rejected', 'Cancelled'), POLICY)).to.equal(false);
    });

    it('should not retry successes', () => {
        expect(shouldRetry(outcome('succeeded'), POLICY)).to.equal(false);
    });

    it('should stop at the last attempt', () => {
        expect(shouldRetry(outcome('failed', 'UpstreamUnavailable', 2), POLICY)).to.equal(true);
        expect(shouldRetry(outcome('failed', 'UpstreamUnavailable', 3), POLICY)).to.equal(false);
        expect(shouldRetry(outcome('failed', 'UpstreamUnavailable'), { ...POLICY, maxAttempts: 1 })).to.equal(false);
    });
});

describe('retryDelay', () => {
    it('should back off exponentially up to the cap', () => {
        expect(retryDelay(1, POLICY)).to.equal(500);
        expect(retryDelay(2, POLICY)).to.equal(1000);
        expect(retryDelay(3, POLICY)).to.equal(1500);
        expect(retryDelay(6, POLICY)).to.equal(1500);
    });
});
