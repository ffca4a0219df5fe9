/**
 * @fileoverview Unit tests for decorator chaining
 *
 * Decorators wrap in registration order: the first registered decorator is
 * the innermost.
 */

import {
  ConfigurationError,
  Container,
  Decoratee,
  DecorateeFactory,
  ServiceLifetime,
  createToken,
  defineGeneric,
  silentLogger,
  typeParam,
} from '../../../src';

// ============================================================================
// Test Fixtures
// ============================================================================

interface IGreeter {
  greet(name: string): string;
}
const IGreeter = createToken<IGreeter>('IGreeter');

interface IPrefix {
  readonly value: string;
}
const IPrefix = createToken<IPrefix>('IPrefix');

class Greeter implements IGreeter {
  greet(name: string): string {
    return `Hello ${name}`;
  }
}

class FormalGreeter implements IGreeter {
  greet(name: string): string {
    return `Good day ${name}`;
  }
}

class ExclaimDecorator implements IGreeter {
  static inject = [Decoratee] as const;
  constructor(readonly inner: IGreeter) {}
  greet(name: string): string {
    return `${this.inner.greet(name)}!`;
  }
}

class BracketDecorator implements IGreeter {
  static inject = [Decoratee] as const;
  constructor(readonly inner: IGreeter) {}
  greet(name: string): string {
    return `[${this.inner.greet(name)}]`;
  }
}

class PrefixDecorator implements IGreeter {
  static inject = [IPrefix, Decoratee] as const;
  constructor(
    readonly prefix: IPrefix,
    readonly inner: IGreeter,
  ) {}
  greet(name: string): string {
    return `${this.prefix.value}${this.inner.greet(name)}`;
  }
}

class FreshGreeterDecorator implements IGreeter {
  static inject = [DecorateeFactory] as const;
  constructor(readonly create: () => IGreeter) {}
  greet(name: string): string {
    return this.create().greet(name);
  }
}

interface ICommandHandler<T> {
  handle(command: T): string;
}
const ICommandHandler = defineGeneric('ICommandHandler', 1);

class TransactionalCommand {}
class PlaceOrder extends TransactionalCommand {}
class Ping {}

class EchoHandler<T> implements ICommandHandler<T> {
  handle(): string {
    return 'handled';
  }
}

class TransactionDecorator<T> implements ICommandHandler<T> {
  static inject = [Decoratee] as const;
  constructor(readonly inner: ICommandHandler<T>) {}
  handle(command: T): string {
    return `tx(${this.inner.handle(command)})`;
  }
}

function createContainer(): Container {
  return new Container({ logger: silentLogger });
}

// ============================================================================
// Tests
// ============================================================================

describe('Decorators', () => {
  it('should wrap the first registered decorator innermost', () => {
    const container = createContainer();
    container.register(IGreeter, Greeter);
    container.registerDecorator(IGreeter, ExclaimDecorator);
    container.registerDecorator(IGreeter, BracketDecorator);

    const greeter = container.getInstance(IGreeter);

    expect(greeter.greet('Ada')).toBe('[Hello Ada!]');
    expect(greeter).toBeInstanceOf(BracketDecorator);
  });

  it('should expose the decorator chain on the producer', () => {
    const container = createContainer();
    container.register(IGreeter, Greeter);
    container.registerDecorator(IGreeter, ExclaimDecorator);

    const producer = container.getRegistration(IGreeter);

    expect(producer?.registration.implementation).toBe(ExclaimDecorator);
    expect(producer?.decoratee?.registration.implementation).toBe(Greeter);
  });

  it('should resolve other dependencies of a decorator', () => {
    const container = createContainer();
    container.register(IGreeter, Greeter);
    container.registerInstance(IPrefix, { value: '>> ' });
    container.registerDecorator(IGreeter, PrefixDecorator);

    expect(container.getInstance(IGreeter).greet('Ada')).toBe('>> Hello Ada');
  });

  it('should skip decorators whose predicate rejects the component', () => {
    const container = createContainer();
    container.register(IGreeter, Greeter);
    container.registerDecorator(IGreeter, ExclaimDecorator, {
      predicate: (context) => context.implementation === FormalGreeter,
    });

    expect(container.getInstance(IGreeter).greet('Ada')).toBe('Hello Ada');
  });

  it('should tell predicates which decorators were already applied', () => {
    const container = createContainer();
    container.register(IGreeter, Greeter);
    container.registerDecorator(IGreeter, ExclaimDecorator);
    container.registerDecorator(IGreeter, BracketDecorator, {
      predicate: (context) => !context.appliedDecorators.includes(ExclaimDecorator),
    });

    expect(container.getInstance(IGreeter).greet('Ada')).toBe('Hello Ada!');
  });

  it('should give decorators the lifetime of the component they wrap', () => {
    const container = createContainer();
    container.registerSingleton(IGreeter, Greeter);
    container.registerDecorator(IGreeter, ExclaimDecorator);

    expect(container.getInstance(IGreeter)).toBe(container.getInstance(IGreeter));
  });

  it('should honour an explicit decorator lifetime', () => {
    const container = createContainer();
    container.registerSingleton(IGreeter, Greeter);
    container.registerDecorator(IGreeter, ExclaimDecorator, { lifetime: ServiceLifetime.Transient });

    const first = container.getInstance(IGreeter);
    const second = container.getInstance(IGreeter);

    expect(first).not.toBe(second);
    expect(first instanceof ExclaimDecorator && second instanceof ExclaimDecorator && first.inner === second.inner).toBe(
      true,
    );
  });

  it('should let a singleton decorator create short-lived decoratees through a factory', () => {
    const container = createContainer();
    let created = 0;
    container.registerFactory(IGreeter, () => {
      created++;
      return new Greeter();
    });
    container.registerDecorator(IGreeter, FreshGreeterDecorator, { lifetime: ServiceLifetime.Singleton });

    const greeter = container.getInstance(IGreeter);
    greeter.greet('Ada');
    greeter.greet('Grace');

    expect(container.getInstance(IGreeter)).toBe(greeter);
    expect(created).toBe(2);
  });

  it('should apply generic decorators only where their constraints hold', () => {
    const container = createContainer();
    container.registerGeneric(ICommandHandler, EchoHandler);
    container.registerDecorator(ICommandHandler, TransactionDecorator, {
      serves: ICommandHandler.pattern(typeParam('TCommand', { extends: TransactionalCommand })),
    });

    const placeOrder = container.getInstance(ICommandHandler.of<ICommandHandler<PlaceOrder>>(PlaceOrder));
    const ping = container.getInstance(ICommandHandler.of<ICommandHandler<Ping>>(Ping));

    expect(placeOrder.handle(new PlaceOrder())).toBe('tx(handled)');
    expect(ping.handle(new Ping())).toBe('handled');
  });

  it('should decorate collection elements', () => {
    const container = createContainer();
    container.collection.register(IGreeter, [Greeter, FormalGreeter]);
    container.registerDecorator(IGreeter, ExclaimDecorator);

    const greetings = container
      .getAllInstances(IGreeter)
      .toArray()
      .map((greeter) => greeter.greet('Ada'));

    expect(greetings).toEqual(['Hello Ada!', 'Good day Ada!']);
  });

  it('should require exactly one decoratee', () => {
    const container = createContainer();

    expect(() => container.registerDecorator(IGreeter, Greeter)).toThrow(
      "Decorator 'Greeter' must declare exactly one Decoratee or DecorateeFactory dependency, found 0",
    );
  });

  it('should reject a decoratee outside a decorator', () => {
    const container = createContainer();

    expect(() => container.register(IGreeter, ExclaimDecorator)).toThrow(
      "'ExclaimDecorator' uses Decoratee/DecorateeFactory but is not registered as a decorator",
    );
  });

  it('should reject a decorator pattern of another service', () => {
    const container = createContainer();
    const IOther = defineGeneric('IOther', 1);

    expect(() =>
      container.registerDecorator(ICommandHandler, TransactionDecorator, { serves: IOther.pattern(Ping) }),
    ).toThrowErrorType(ConfigurationError);
  });
});
