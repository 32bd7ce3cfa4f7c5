import { afterEach, describe, expect, it, vi } from 'vitest';

import { RegistrationStore, type Registration } from '../src/core/registration-store.js';
import { DuplicateRegistrationError } from '../src/errors/errors.js';

class Clock {}
class Calendar {}

const createRegistration = (id: string, overrides: Partial<Registration> = {}): Registration => ({
  id,
  type: Clock,
  ctor: Clock,
  ...overrides,
});

describe('RegistrationStore', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps registrations in insertion order', () => {
    const store = new RegistrationStore('Main');
    const clock = createRegistration('clock');

    store.add(clock);
    store.add(createRegistration('calendar', { type: Calendar, ctor: Calendar }));

    expect(store.size).toBe(2);
    expect(store.get('clock')).toBe(clock);
    expect(store.has('calendar')).toBe(true);
    expect(store.has('missing')).toBe(false);
    expect(store.ids()).toEqual(['clock', 'calendar']);
    expect(Array.from(store.values()).map((r) => r.type)).toEqual([Clock, Calendar]);
  });

  it('rejects duplicate ids under the default policy', () => {
    const store = new RegistrationStore('Main');
    store.add(createRegistration('clock'));

    expect(() => store.add(createRegistration('clock'))).toThrowError(DuplicateRegistrationError);
  });

  it('replaces in place and warns under the warn policy', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = new RegistrationStore('Main', 'warn');
    store.add(createRegistration('clock'));
    store.add(createRegistration('calendar'));

    const replacement = createRegistration('clock', { type: Calendar });
    store.add(replacement);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("[precedence] Registration 'clock' replaced in catalog 'Main'.");
    expect(store.ids()).toEqual(['clock', 'calendar']);
    expect(store.get('clock')).toBe(replacement);
  });

  it('replaces silently under the allow policy', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = new RegistrationStore('Main', 'allow');
    store.add(createRegistration('clock'));
    store.add(createRegistration('clock', { type: Calendar }));

    expect(warn).not.toHaveBeenCalled();
    expect(store.size).toBe(1);
    expect(store.get('clock')?.type).toBe(Calendar);
  });
});
