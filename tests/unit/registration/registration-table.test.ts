/**
 * @fileoverview Unit tests for the registration table
 */

import {
  ConfigurationError,
  GenericRegistration,
  ILogger,
  Registration,
  RegistrationOwner,
  RegistrationTable,
  ServiceLifetime,
  createToken,
  defineGeneric,
  typeParam,
} from '../../../src';

interface IRule {
  check(): boolean;
}
const IRule = createToken<IRule>('IRule');
const IHandler = defineGeneric('IHandler', 1);

class Order {}
class OrderHandler {}
class FallbackHandler {}

function createLogger(): ILogger & { warnings: string[]; debugs: string[] } {
  const warnings: string[] = [];
  const debugs: string[] = [];
  return {
    warnings,
    debugs,
    debug: (message) => debugs.push(message),
    info: () => undefined,
    warn: (message) => warnings.push(message),
    error: () => undefined,
  };
}

const owner: RegistrationOwner = { name: 'test', trackSingleton: () => undefined };

function registration(lifetime: ServiceLifetime = ServiceLifetime.Transient): Registration {
  return new Registration(owner, { lifetime, activator: () => ({}), dependencies: [] });
}

describe('RegistrationTable', () => {
  let logger: ReturnType<typeof createLogger>;
  let table: RegistrationTable;

  beforeEach(() => {
    logger = createLogger();
    table = new RegistrationTable({ allowOverridingRegistrations: false, logger });
  });

  describe('Single Registrations', () => {
    it('should look registrations up by key', () => {
      const rule = registration();
      table.register(IRule, rule);

      expect(table.getRegistration(IRule)).toBe(rule);
      expect(table.getRegistration(createToken('IRule'))).toBeUndefined();
    });

    it('should reject a duplicate key', () => {
      table.register(IRule, registration());

      expect(() => table.register(IRule, registration())).toThrow(
        "Type 'IRule' has already been registered. Set 'allowOverridingRegistrations' to replace existing registrations",
      );
    });

    it('should replace and warn when overriding is allowed', () => {
      const overriding = new RegistrationTable({ allowOverridingRegistrations: true, logger });
      const second = registration();
      overriding.register(IRule, registration());
      overriding.register(IRule, second);

      expect(overriding.getRegistration(IRule)).toBe(second);
      expect(logger.warnings).toEqual(["Overriding registration for 'IRule'"]);
    });

    it('should let one registration serve several keys', () => {
      const IReader = createToken('IReader');
      const IWriter = createToken('IWriter');
      const shared = registration(ServiceLifetime.Singleton);

      table.register(IReader, shared);
      table.register(IWriter, shared);

      expect(table.getRegistration(IReader)).toBe(table.getRegistration(IWriter));
    });
  });

  describe('Conditional Registrations', () => {
    it('should keep conditionals in registration order', () => {
      const first = { registration: registration(), predicate: () => true };
      const second = { registration: registration(), predicate: () => false };
      table.registerConditional(IRule, first);
      table.registerConditional(IRule, second);

      expect(table.getConditionals(IRule)).toEqual([first, second]);
    });

    it('should not mix conditional and unconditional registrations', () => {
      table.registerConditional(IRule, { registration: registration(), predicate: () => true });

      expect(() => table.register(IRule, registration())).toThrowErrorType(ConfigurationError);

      const other = createToken('IOther');
      table.register(other, registration());
      expect(() =>
        table.registerConditional(other, { registration: registration(), predicate: () => true }),
      ).toThrowErrorType(ConfigurationError);
    });
  });

  describe('Open Generics', () => {
    const generic = (implementation: new () => unknown, pattern = IHandler.openPattern()): GenericRegistration =>
      new GenericRegistration(owner, pattern, implementation, [], ServiceLifetime.Transient);

    it('should reject a second fully open implementation', () => {
      table.registerGeneric(generic(OrderHandler));

      expect(() => table.registerGeneric(generic(FallbackHandler))).toThrow(
        "Open generic 'IHandler<>' already has an unconditional implementation ('OrderHandler')",
      );
    });

    it('should accept implementations for distinct closures', () => {
      table.registerGeneric(generic(OrderHandler, IHandler.pattern(Order)));
      table.registerGeneric(generic(FallbackHandler));

      expect(table.getGenerics(IHandler).map((g) => g.displayName)).toEqual(['OrderHandler', 'FallbackHandler']);
    });

    it('should list closed keys of parameterless patterns as verifiable', () => {
      table.register(IRule, registration());
      table.registerGeneric(generic(OrderHandler, IHandler.pattern(Order)));
      table.registerGeneric(generic(FallbackHandler, IHandler.pattern(typeParam('T'))));

      expect(table.getVerifiableKeys()).toEqual([IRule, IHandler.of(Order)]);
    });
  });

  describe('Collections', () => {
    it('should keep elements in registration order', () => {
      const first = registration();
      const second = registration();
      const third = registration();
      table.registerCollection(IRule, [first, second]);
      table.appendToCollection(IRule, third);

      expect(table.getCollectionElements(IRule)).toEqual([first, second, third]);
      expect(table.hasCollection(IRule)).toBe(true);
    });

    it('should reject declaring a collection twice', () => {
      table.registerCollection(IRule, []);

      expect(() => table.registerCollection(IRule, [])).toThrow(
        "A collection for 'IRule' has already been registered; use collection.append to add elements",
      );
    });

    it('should merge open-generic elements into closed collections', () => {
      const exact = registration();
      const open = new GenericRegistration(owner, IHandler.openPattern(), OrderHandler, [], ServiceLifetime.Transient);
      table.appendToCollection(IHandler.of(Order), exact);
      table.appendToCollection(IHandler, open);

      expect(table.hasCollection(IHandler.of(FallbackHandler))).toBe(true);
      expect(table.getCollectionElements(IHandler.of(Order))).toEqual([exact, open]);
      expect(table.getCollectionElements(IHandler.of(FallbackHandler))).toEqual([open]);
    });
  });

  describe('Locking', () => {
    it('should reject every change once locked', () => {
      table.lock();

      expect(table.isLocked).toBe(true);
      expect(() => table.register(IRule, registration())).toThrow(
        'The container can no longer be changed after the first instance was resolved or the container was verified',
      );
      expect(() => table.appendToCollection(IRule, registration())).toThrowErrorType(ConfigurationError);
      expect(() => table.registerInitializer({ type: Order, action: () => undefined })).toThrowErrorType(
        ConfigurationError,
      );
    });

    it('should log the table size once', () => {
      table.register(IRule, registration());
      table.lock();
      table.lock();

      expect(logger.debugs).toEqual([
        'Registration table locked with 1 single, 0 conditional, 0 open-generic and 0 collection registration(s)',
      ]);
    });
  });
});
