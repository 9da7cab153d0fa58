import { describe, expect, it } from 'vitest';
import { advanceStatus, canTransition, deriveRemoteStatus, mergeStatus } from './messageStatus';

describe('message status machine', () => {
  it('allows the documented edges', () => {
    expect(canTransition('SENDING', 'SENT')).toBe(true);
    expect(canTransition('SENDING', 'FAILED')).toBe(true);
    expect(canTransition('FAILED', 'SENDING')).toBe(true);
    expect(canTransition('FAILED', 'SENT')).toBe(true);
    expect(canTransition('SENT', 'READ')).toBe(true);
    expect(canTransition('DELIVERED', 'READ')).toBe(true);
  });

  it('refuses regressions and moves out of READ', () => {
    expect(canTransition('DELIVERED', 'SENT')).toBe(false);
    expect(canTransition('SENT', 'FAILED')).toBe(false);
    expect(canTransition('READ', 'DELIVERED')).toBe(false);
    expect(() => advanceStatus('READ', 'SENT')).toThrow('Illegal message status transition READ -> SENT');
    expect(advanceStatus('SENT', 'DELIVERED')).toBe('DELIVERED');
  });

  it('derives the remote status from receipts of non-senders', () => {
    expect(deriveRemoteStatus({ senderId: 'a', readBy: {}, deliveredTo: {} })).toBe('SENT');
    expect(deriveRemoteStatus({ senderId: 'a', readBy: { a: 1 }, deliveredTo: { a: 1 } })).toBe('SENT');
    expect(deriveRemoteStatus({ senderId: 'a', readBy: {}, deliveredTo: { b: 1 } })).toBe('DELIVERED');
    expect(deriveRemoteStatus({ senderId: 'a', readBy: { b: 2 }, deliveredTo: {} })).toBe('READ');
  });

  it('never lets a confirmed status regress', () => {
    expect(mergeStatus('READ', 'SENT')).toBe('READ');
    expect(mergeStatus('SENDING', 'SENT')).toBe('SENT');
    expect(mergeStatus('FAILED', 'DELIVERED')).toBe('DELIVERED');
    expect(mergeStatus('SENDING', 'FAILED')).toBe('SENDING');
  });
});
