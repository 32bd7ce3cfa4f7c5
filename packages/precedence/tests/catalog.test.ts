import { beforeEach, describe, expect, it, vi } from 'vitest';

import { Catalog } from '../src/core/catalog.js';
import { ORDER, type Ordered } from '../src/core/capability.js';
import { Order } from '../src/decorators/order.js';
import { Produces } from '../src/decorators/produces.js';
import {
  DuplicateRegistrationError,
  InvalidRegistrationError,
  ProducerExecutionError,
  RegistrationNotFoundError,
} from '../src/errors/errors.js';
import { AnnotationRegistry } from '../src/registry/annotation-registry.js';

describe('Catalog', () => {
  beforeEach(() => {
    AnnotationRegistry.resetForTests();
  });

  describe('registration', () => {
    it('registers bare classes under their class name and creates them once', () => {
      class Clock {}

      const catalog = new Catalog({ registrations: [Clock] });
      const first = catalog.get('Clock');

      expect(catalog.ids()).toEqual(['Clock']);
      expect(first).toBeInstanceOf(Clock);
      expect(catalog.get('Clock')).toBe(first);
    });

    it('accepts class, value and producer descriptors', () => {
      class Clock {}
      class Cache {}
      class CacheModule {
        static cache() {
          return new Cache();
        }
      }
      const value = new Clock();

      const catalog = new Catalog({
        registrations: [
          { id: 'clock', useClass: Clock },
          { id: 'fixed', useValue: value },
          {
            id: 'cache',
            useProducer: { declaringClass: CacheModule, methodName: 'cache', isStatic: true },
            type: Cache,
          },
        ],
      });

      expect(catalog.ids()).toEqual(['clock', 'fixed', 'cache']);
      expect(catalog.get('fixed')).toBe(value);
      expect(catalog.get('cache')).toBeInstanceOf(Cache);
      expect(catalog.metadataFor('cache')).toEqual({
        id: 'cache',
        type: Cache,
        producer: { declaringClass: CacheModule, methodName: 'cache', isStatic: true },
      });
      expect(catalog.metadataFor('fixed')).toEqual({ id: 'fixed', type: Clock });
    });

    it('registers every @Produces method of a module and shares one module instance', () => {
      let modulesCreated = 0;
      class Http {}
      class Grpc {}

      class TransportModule {
        constructor() {
          modulesCreated += 1;
        }

        @Produces({ type: Http })
        http() {
          return new Http();
        }

        @Produces({ type: Grpc, name: 'rpc' })
        grpc() {
          return new Grpc();
        }
      }

      const catalog = new Catalog({ modules: [TransportModule] });

      expect(catalog.ids()).toEqual(['http', 'rpc']);
      expect(catalog.get('http')).toBeInstanceOf(Http);
      expect(catalog.get('rpc')).toBeInstanceOf(Grpc);
      expect(modulesCreated).toBe(1);
    });

    it('registers static producers without creating the module', () => {
      let modulesCreated = 0;
      class Pool {}

      class PoolModule {
        constructor() {
          modulesCreated += 1;
        }

        @Produces({ type: Pool })
        static pool() {
          return new Pool();
        }
      }

      const catalog = new Catalog().registerModule(PoolModule);

      expect(catalog.get('pool')).toBeInstanceOf(Pool);
      expect(catalog.metadataFor('pool').producer?.isStatic).toBe(true);
      expect(modulesCreated).toBe(0);
    });

    it('rejects invalid registrations', () => {
      class Empty {}
      class Widget {}

      const catalog = new Catalog();

      expect(() => catalog.registerModule(Empty)).toThrowError(InvalidRegistrationError);
      expect(() => catalog.registerProducer('w', Empty, 'missing', Widget)).toThrowError(
        InvalidRegistrationError
      );
      expect(() => catalog.registerClass('', Widget)).toThrowError(InvalidRegistrationError);
      expect(() => catalog.registerValue('n', 5 as never)).toThrowError(InvalidRegistrationError);
      expect(() => catalog.register({ id: 'x' } as never)).toThrowError(InvalidRegistrationError);
      expect(() => catalog.register(null as never)).toThrowError(InvalidRegistrationError);
      expect(() => new Catalog(null as never)).toThrowError(InvalidRegistrationError);
    });
  });

  describe('duplicate policy', () => {
    it('rejects duplicate ids by default', () => {
      class Clock {}
      const catalog = new Catalog({ name: 'Main', registrations: [Clock] });

      expect(() => catalog.registerClass('Clock', Clock)).toThrowError(DuplicateRegistrationError);
    });

    it("warns and replaces under 'warn'", () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      class Clock {}
      class Other {}
      const replacement = new Clock();

      const catalog = new Catalog({
        name: 'Main',
        duplicatePolicy: 'warn',
        registrations: [Clock, Other],
      });
      catalog.registerValue('Clock', replacement);

      expect(warn).toHaveBeenCalledWith("[precedence] Registration 'Clock' replaced in catalog 'Main'.");
      expect(catalog.get('Clock')).toBe(replacement);
      expect(catalog.ids()).toEqual(['Clock', 'Other']);
    });

    it("replaces silently under 'allow'", () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      class Clock {}

      const catalog = new Catalog({ duplicatePolicy: 'allow', registrations: [Clock] });
      catalog.registerValue('Clock', { replaced: true });

      expect(warn).not.toHaveBeenCalled();
      expect(catalog.get('Clock')).toEqual({ replaced: true });
    });
  });

  describe('registry queries', () => {
    it('looks up registrations by type, including subclasses', () => {
      class Listener {}
      class AuditListener extends Listener {}
      class Unrelated {}

      const catalog = new Catalog({ registrations: [Listener, AuditListener, Unrelated] });

      expect(catalog.lookupByType(Listener)).toEqual(['Listener', 'AuditListener']);
      expect(catalog.lookupByType(AuditListener)).toEqual(['AuditListener']);
      expect(catalog.isRegistered('Unrelated')).toBe(true);
      expect(catalog.isRegistered('Missing')).toBe(false);
    });

    it('resolves producer types from the created instance once it exists', () => {
      class Listener {}
      class AuditListener extends Listener {}

      class ListenerModule {
        @Produces({ type: Listener })
        audit() {
          return new AuditListener();
        }
      }

      const catalog = new Catalog({ modules: [ListenerModule] });

      expect(catalog.lookupByType(AuditListener)).toEqual([]);
      expect(catalog.metadataFor('audit').type).toBe(Listener);

      catalog.get('audit');

      expect(catalog.lookupByType(AuditListener)).toEqual(['audit']);
      expect(catalog.metadataFor('audit').type).toBe(AuditListener);
    });

    it('reports unknown ids with the registered ones', () => {
      class Clock {}
      const catalog = new Catalog({ name: 'Main', registrations: [Clock] });

      let caught: unknown;
      try {
        catalog.metadataFor('Calendar');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(RegistrationNotFoundError);
      if (caught instanceof RegistrationNotFoundError) {
        expect(caught.id).toBe('Calendar');
        expect(caught.catalogName).toBe('Main');
        expect(caught.availableIds).toEqual(['Clock']);
      }
      expect(() => catalog.get('Calendar')).toThrowError(RegistrationNotFoundError);
    });

    it('lists registrations whose producer carries an annotation', () => {
      class Job {}

      class JobModule {
        @Produces({ type: Job, name: 'nightly' })
        @Order(2)
        nightly() {
          return new Job();
        }

        @Produces({ type: Job, name: 'hourly' })
        hourly() {
          return new Job();
        }
      }

      const catalog = new Catalog({ registrations: [Job], modules: [JobModule] });

      expect(catalog.annotatedWith('order')).toEqual(['nightly']);
      expect(catalog.annotatedWith('tier')).toEqual([]);
    });
  });

  describe('instances', () => {
    it('wraps producer failures in ProducerExecutionError', () => {
      const boom = new Error('disk full');
      class Cache {}

      class CacheModule {
        @Produces({ type: Cache })
        cache(): Cache {
          throw boom;
        }

        @Produces({ type: Cache, name: 'empty' })
        empty() {
          return undefined;
        }
      }

      const catalog = new Catalog({ modules: [CacheModule] });

      let caught: unknown;
      try {
        catalog.get('cache');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ProducerExecutionError);
      if (caught instanceof ProducerExecutionError) {
        expect(caught.id).toBe('cache');
        expect(caught.producer).toBe('CacheModule#cache()');
        expect(caught.cause).toBe(boom);
      }
      expect(() => catalog.get('empty')).toThrowError(ProducerExecutionError);
    });

    it('reports each materialization through onInstantiate', () => {
      const onInstantiate = vi.fn();
      class Clock {}

      const catalog = new Catalog({ registrations: [Clock], onInstantiate });
      catalog.get('Clock');
      catalog.get('Clock');

      expect(onInstantiate).toHaveBeenCalledTimes(1);
      expect(onInstantiate).toHaveBeenCalledWith('Clock', expect.any(Number));
    });

    it('returns instances of a type in registration order', () => {
      class Listener {}
      class MailListener extends Listener {}
      class Clock {}

      const catalog = new Catalog({ registrations: [MailListener, Clock, Listener] });
      const listeners = catalog.instancesOfType(Listener);

      expect(listeners).toHaveLength(2);
      expect(listeners[0]).toBeInstanceOf(MailListener);
      expect(listeners[1]).toBe(catalog.get('Listener'));
    });

    it('sorts instances of a type by resolved order', () => {
      class Listener {}

      @Order(20)
      class AuditListener extends Listener {}

      class MailListener extends Listener implements Ordered {
        [ORDER]() {
          return 10;
        }
      }

      class MetricsListener extends Listener {
        getOrder() {
          return 30;
        }
      }

      class ListenerModule {
        @Produces({ type: AuditListener, name: 'urgentAudit' })
        @Order(1)
        urgentAudit() {
          return new AuditListener();
        }
      }

      const catalog = new Catalog({
        registrations: [Listener, MetricsListener, MailListener],
        modules: [ListenerModule],
      });

      const sorted = catalog.sortedInstancesOfType(Listener);

      expect(sorted.map((l) => l.constructor.name)).toEqual([
        'AuditListener',
        'MailListener',
        'MetricsListener',
        'Listener',
      ]);
    });
  });
});
