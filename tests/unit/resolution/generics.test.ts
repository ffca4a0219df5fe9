/**
 * @fileoverview Unit tests for open generics and conditional registrations
 *
 * Both are ways to have several candidates for one key. Exactly one
 * candidate must apply; the container never picks the first of several.
 */

import {
  AmbiguousResolutionError,
  ConfigurationError,
  Container,
  MissingDependencyError,
  PredicateContext,
  ServiceLifetime,
  createToken,
  defineGeneric,
  typeArgument,
  typeParam,
  silentLogger,
} from '../../../src';

// ============================================================================
// Test Fixtures
// ============================================================================

interface ICommandHandler<TCommand> {
  handle(command: TCommand): string;
}
const ICommandHandler = defineGeneric('ICommandHandler', 1);

interface IValidator<T> {
  validate(value: T): boolean;
}
const IValidator = defineGeneric('IValidator', 1);

class Command {}
class CreateOrder extends Command {}
class CancelOrder extends Command {}
class ShipOrder extends Command {}
class Ping {}

const TCommand = typeParam('TCommand');
const TAnyCommand = typeParam('TAnyCommand', { extends: Command });
const TOther = typeParam('TOther', { where: (argument) => argument !== CreateOrder });

class CreateOrderHandler implements ICommandHandler<CreateOrder> {
  handle(): string {
    return 'created';
  }
}

class GenericCommandHandler implements ICommandHandler<Command> {
  static inject = [typeArgument(TAnyCommand)] as const;
  constructor(readonly commandType: unknown) {}
  handle(): string {
    return 'generic';
  }
}

class AcceptAllValidator<T> implements IValidator<T> {
  validate(): boolean {
    return true;
  }
}

class ValidatingHandler<T> implements ICommandHandler<T> {
  static inject = [IValidator.pattern(TOther)] as const;
  constructor(readonly validator: IValidator<T>) {}
  handle(): string {
    return 'validated';
  }
}

interface ILogger {
  log(message: string): string;
}
const ILogger = createToken<ILogger>('ILogger');

class FileLogger implements ILogger {
  log(message: string): string {
    return `file: ${message}`;
  }
}

class ConsoleLogger implements ILogger {
  log(message: string): string {
    return `console: ${message}`;
  }
}

class AuditService {
  static inject = [ILogger] as const;
  constructor(readonly logger: ILogger) {}
}

class CheckoutService {
  static inject = [ILogger] as const;
  constructor(readonly logger: ILogger) {}
}

class PrefixingLogger implements ILogger {
  static inject = [ILogger] as const;
  constructor(private readonly inner: ILogger) {}
  log(message: string): string {
    return `prefix > ${this.inner.log(message)}`;
  }
}

class FrontDesk {
  static inject = [ICommandHandler.of(CreateOrder)] as const;
  constructor(readonly handler: ICommandHandler<CreateOrder>) {}
}

class PriorityDesk {
  static inject = [ICommandHandler.of(CreateOrder)] as const;
  constructor(readonly handler: ICommandHandler<CreateOrder>) {}
}

function createContainer(): Container {
  return new Container({ logger: silentLogger });
}

// ============================================================================
// Tests
// ============================================================================

describe('Open Generics', () => {
  it('should close an open implementation for the requested key', () => {
    const container = createContainer();
    container.registerGeneric(ICommandHandler, GenericCommandHandler, {
      serves: ICommandHandler.pattern(TAnyCommand),
    });

    const handler = container.getInstance(ICommandHandler.of<GenericCommandHandler>(CancelOrder));

    expect(handler).toBeInstanceOf(GenericCommandHandler);
    expect(handler.commandType).toBe(CancelOrder);
  });

  it('should cache one closure per closed key', () => {
    const container = createContainer();
    container.registerGeneric(ICommandHandler, GenericCommandHandler, {
      serves: ICommandHandler.pattern(TAnyCommand),
      lifetime: ServiceLifetime.Singleton,
    });

    const cancel = container.getInstance(ICommandHandler.of(CancelOrder));

    expect(container.getInstance(ICommandHandler.of(CancelOrder))).toBe(cancel);
    expect(container.getInstance(ICommandHandler.of(ShipOrder))).not.toBe(cancel);
  });

  it('should skip implementations whose constraints fail', () => {
    const container = createContainer();
    container.registerGeneric(ICommandHandler, GenericCommandHandler, {
      serves: ICommandHandler.pattern(TAnyCommand),
    });

    expect(() => container.getInstance(ICommandHandler.of(Ping))).toThrow(
      "No registration for service 'ICommandHandler<Ping>' could be found",
    );
  });

  it('should reject a closed key served by two implementations', () => {
    const container = createContainer();
    container.registerGeneric(ICommandHandler, CreateOrderHandler, {
      serves: ICommandHandler.pattern(CreateOrder),
    });
    container.registerGeneric(ICommandHandler, GenericCommandHandler, {
      serves: ICommandHandler.pattern(TAnyCommand),
    });

    expect(() => container.getInstance(ICommandHandler.of(CreateOrder))).toThrow(
      "Multiple registrations match service 'ICommandHandler<CreateOrder>': CreateOrderHandler, " +
        'GenericCommandHandler. Make the predicates or type constraints mutually exclusive',
    );
    expect(container.getInstance(ICommandHandler.of(CancelOrder))).toBeInstanceOf(GenericCommandHandler);
  });

  it('should prefer an exact registration over open implementations', () => {
    const container = createContainer();
    container.register(ICommandHandler.of(CreateOrder), CreateOrderHandler);
    container.registerGeneric(ICommandHandler, GenericCommandHandler, {
      serves: ICommandHandler.pattern(TAnyCommand),
    });

    expect(container.getInstance(ICommandHandler.of(CreateOrder))).toBeInstanceOf(CreateOrderHandler);
  });

  it('should close pattern dependencies with the same bindings', () => {
    const container = createContainer();
    container.registerGeneric(IValidator, AcceptAllValidator, { serves: IValidator.pattern(TCommand) });
    container.registerGeneric(ICommandHandler, ValidatingHandler, { serves: ICommandHandler.pattern(TOther) });

    const handler = container.getInstance(ICommandHandler.of<ValidatingHandler<ShipOrder>>(ShipOrder));

    expect(handler.validator).toBeInstanceOf(AcceptAllValidator);
    expect(container.getRegistration(IValidator.of(ShipOrder))?.registration.closedFor).toBe(IValidator.of(ShipOrder));
    expect(() => container.getInstance(ICommandHandler.of(CreateOrder))).toThrowErrorType(MissingDependencyError);
  });

  it('should reject dependencies on parameters the pattern does not bind', () => {
    const container = createContainer();

    expect(() =>
      container.registerGeneric(ICommandHandler, ValidatingHandler, { serves: ICommandHandler.pattern(TCommand) }),
    ).toThrow(
      "'ValidatingHandler' depends on type parameter 'TOther', which the service pattern it is registered for does not bind",
    );
  });

  it('should reject a pattern of another generic', () => {
    const container = createContainer();

    expect(() =>
      container.registerGeneric(ICommandHandler, AcceptAllValidator, { serves: IValidator.pattern(TCommand) }),
    ).toThrowErrorType(ConfigurationError);
  });

  it('should pick the implementation whose predicate accepts the consumer', () => {
    const container = createContainer();
    const forCreate = (context: PredicateContext): boolean => context.serviceKey === ICommandHandler.of(CreateOrder);
    container.registerGeneric(ICommandHandler, CreateOrderHandler, {
      serves: ICommandHandler.pattern(TCommand),
      predicate: forCreate,
    });
    container.registerGeneric(ICommandHandler, GenericCommandHandler, {
      serves: ICommandHandler.pattern(TAnyCommand),
      predicate: (context) => !context.handled,
    });

    expect(container.getInstance(ICommandHandler.of(CreateOrder))).toBeInstanceOf(CreateOrderHandler);
    expect(container.getInstance(ICommandHandler.of(CancelOrder))).toBeInstanceOf(GenericCommandHandler);
  });
});

describe('Conditional Registrations', () => {
  function registerLoggers(container: Container): void {
    container.registerConditional(
      ILogger,
      FileLogger,
      ServiceLifetime.Singleton,
      (context) => context.consumer?.implementation === AuditService,
    );
    container.registerConditional(ILogger, ConsoleLogger, ServiceLifetime.Singleton, (context) => !context.handled);
  }

  it('should choose per consumer', () => {
    const container = createContainer();
    registerLoggers(container);
    container.register(AuditService);
    container.register(CheckoutService);

    expect(container.getInstance(AuditService).logger.log('x')).toBe('file: x');
    expect(container.getInstance(CheckoutService).logger.log('x')).toBe('console: x');
    expect(container.getInstance(ILogger)).toBeInstanceOf(ConsoleLogger);
  });

  it('should share a conditional singleton between consumers it applies to', () => {
    const container = createContainer();
    registerLoggers(container);
    container.register(CheckoutService);

    expect(container.getInstance(CheckoutService).logger).toBe(container.getInstance(ILogger));
  });

  it('should reject two conditionals that both apply', () => {
    const container = createContainer();
    container.registerConditional(ILogger, FileLogger, undefined, () => true);
    container.registerConditional(ILogger, ConsoleLogger, undefined, () => true);

    expect(() => container.getInstance(ILogger)).toThrow(
      "Multiple registrations match service 'ILogger': FileLogger, ConsoleLogger. " +
        'Make the predicates or type constraints mutually exclusive',
    );
    expect(() => container.getInstance(ILogger)).toThrowErrorType(AmbiguousResolutionError);
  });

  it('should fall back when no conditional applies', () => {
    const container = createContainer();
    container.registerConditional(ILogger, FileLogger, undefined, () => false);

    expect(() => container.getInstance(ILogger)).toThrowErrorType(MissingDependencyError);
  });

  it('should let conditionals serve the same key at several depths', () => {
    const container = createContainer();
    container.registerConditional(
      ILogger,
      PrefixingLogger,
      undefined,
      (context) => context.consumer?.implementation === CheckoutService,
    );
    container.registerConditional(
      ILogger,
      FileLogger,
      undefined,
      (context) => context.consumer?.implementation === PrefixingLogger,
    );
    container.register(CheckoutService);

    expect(container.getInstance(CheckoutService).logger.log('x')).toBe('prefix > file: x');
  });

  it('should still detect a conditional registration that consumes itself', () => {
    const container = createContainer();
    container.registerConditional(ILogger, PrefixingLogger, undefined, () => true);

    expect(() => container.getInstance(ILogger)).toThrow('Circular dependency detected: ILogger → ILogger');
  });

  it('should evaluate conditionals for every consumer when a generic also serves the key', () => {
    const container = createContainer();
    container.registerGeneric(ICommandHandler, GenericCommandHandler, {
      serves: ICommandHandler.pattern(TAnyCommand),
    });
    container.registerConditional(
      ICommandHandler.of(CreateOrder),
      CreateOrderHandler,
      undefined,
      (context) => context.consumer?.implementation === PriorityDesk,
    );
    container.register(FrontDesk);
    container.register(PriorityDesk);

    expect(container.getInstance(FrontDesk).handler).toBeInstanceOf(GenericCommandHandler);
    expect(container.getInstance(PriorityDesk).handler).toBeInstanceOf(CreateOrderHandler);
    expect(container.getInstance(FrontDesk).handler).toBeInstanceOf(GenericCommandHandler);
  });
});
