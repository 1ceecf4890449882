/**
 * Event Tests
 */

import { Event, EventPriority } from '../src/event';

describe('Event', () => {
  it('should create an event with defaults', () => {
    const event = Event.create('GO', { amount: 10 });

    expect(event.name).toBe('GO');
    expect(event.payload).toEqual({ amount: 10 });
    expect(event.priority).toBe(EventPriority.NORMAL);
    expect(event.timestamp).toBeInstanceOf(Date);
    expect(event.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(event.metadata).toEqual({});
  });

  it('should give every event a distinct id', () => {
    expect(Event.create('A').id).not.toBe(Event.create('A').id);
  });

  it('should be immutable', () => {
    const event = Event.create('GO');

    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.metadata)).toBe(true);
  });

  it('should derive copies with priority and metadata', () => {
    const event = Event.create('GO');
    const urgent = event.withPriority(EventPriority.CRITICAL).withMetadata('source', 'test');

    expect(urgent.priority).toBe(EventPriority.CRITICAL);
    expect(urgent.getMetadata('source')).toBe('test');
    expect(urgent.hasMetadata('source')).toBe(true);
    expect(urgent.id).toBe(event.id);
    expect(event.priority).toBe(EventPriority.NORMAL);
    expect(event.hasMetadata('source')).toBe(false);
  });

  it('should share the payload by reference', () => {
    const payload = { items: [1, 2] };
    const event = Event.create('GO', payload);

    expect(event.clone().payload).toBe(payload);
    expect(event.rename('START').payload).toBe(payload);
  });

  it('should rename into a new event', () => {
    const event = Event.create('GO').withMetadata('k', 1);
    const renamed = event.rename('START');

    expect(renamed.name).toBe('START');
    expect(renamed.id).not.toBe(event.id);
    expect(renamed.getMetadata('k')).toBe(1);
  });
});
