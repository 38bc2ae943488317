/**
 * Tests for the telemetry session registry
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TelemetrySessionManager } from '../../src/core/session-manager.js';
import { Logger } from '../../src/utils/logger.js';

describe('TelemetrySessionManager', () => {
  let now: number;
  let log: Logger;
  let manager: TelemetrySessionManager;

  beforeEach(() => {
    now = 0;
    log = new Logger('test');
    vi.spyOn(log, 'debug').mockImplementation(() => {});
    vi.spyOn(log, 'info').mockImplementation(() => {});
    manager = new TelemetrySessionManager({
      clock: () => now,
      logger: log,
      config: { timelineSize: 5 },
    });
  });

  it('should create and look up sessions by id', () => {
    const session = manager.create({ sessionId: 'checkout' });

    expect(manager.get('checkout')).toBe(session);
    expect(manager.list()).toEqual([session]);
    expect(manager.size).toBe(1);
  });

  it('should generate ids when none are given', () => {
    const a = manager.create();
    const b = manager.create();

    expect(a.sessionId).not.toBe(b.sessionId);
    expect(manager.size).toBe(2);
  });

  it('should reject a duplicate session id', () => {
    manager.create({ sessionId: 'dup' });

    expect(() => manager.create({ sessionId: 'dup' })).toThrow('Session already exists: dup');
  });

  it('should merge manager defaults with per-session config', () => {
    const session = manager.create({ sessionId: 's', config: { criticalIssueLimit: 3 } });

    expect(session.config.timelineSize).toBe(5);
    expect(session.config.criticalIssueLimit).toBe(3);
  });

  it('should share the manager clock with its sessions', () => {
    now = 100;
    const session = manager.create({ sessionId: 's' });
    now = 175;

    expect(session.getSessionSummary().sessionDuration).toBe(75);
  });

  it('should stop a single session', () => {
    const session = manager.create({ sessionId: 's' });
    session.handleRequest({ requestId: 'r1', url: 'https://a.com/' });

    expect(manager.stop('s')).toEqual({ sessionId: 's', pendingRequests: 1, sessionDuration: 0 });
    expect(session.isActive).toBe(false);
    expect(manager.stop('missing')).toBeUndefined();
  });

  it('should stop every session without waiting on pending work', () => {
    const a = manager.create({ sessionId: 'a' });
    const b = manager.create({ sessionId: 'b' });
    a.handleRequest({ url: 'https://a.com/slow' });

    const reports = manager.stopAll();

    expect(reports.map((r) => [r.sessionId, r.pendingRequests])).toEqual([
      ['a', 1],
      ['b', 0],
    ]);
    expect(a.isActive).toBe(false);
    expect(b.isActive).toBe(false);
  });

  it('should stop and unregister on remove', () => {
    const session = manager.create({ sessionId: 's' });

    expect(manager.remove('s')).toBe(true);
    expect(session.isActive).toBe(false);
    expect(manager.get('s')).toBeUndefined();
    expect(manager.remove('s')).toBe(false);
  });
});
