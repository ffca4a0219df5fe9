/**
 * @file Order Pipeline Integration Tests
 * @description Wires a small command pipeline end to end: an exact handler,
 * an open-generic fallback, a transaction decorator, a rule collection and a
 * unit of work per async scope.
 *
 * GUARANTEES:
 * ✅ The decorator and the handler share the unit of work of their scope
 * ✅ The unit of work is disposed when the scope ends, even on failure
 * ✅ Verification passes without leaving instances behind
 * ✅ Container disposal reaches the singletons it created
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  AsyncScopedLifestyle,
  Container,
  Decoratee,
  ScopeViolationError,
  ServiceLifetime,
  collectionOf,
  createToken,
  defineGeneric,
  describeKey,
  silentLogger,
  typeArgument,
  typeParam,
} from '../../../src';
import type { LazyCollection, ServiceKey } from '../../../src';
import { captureError, captureRejection } from '../../helpers';

// ============================================================================
// Application Fixtures
// ============================================================================

interface ICommandHandler<TCommand> {
  handle(command: TCommand): Promise<string>;
}
const ICommandHandler = defineGeneric('ICommandHandler', 1);

class PlaceOrder {
  constructor(
    readonly sku: string,
    readonly quantity: number,
  ) {}
}

class CancelOrder {
  constructor(readonly orderId: string) {}
}

interface IOrderRule {
  check(command: PlaceOrder): string | undefined;
}
const IOrderRule = createToken<IOrderRule>('IOrderRule');

class PositiveQuantityRule implements IOrderRule {
  check(command: PlaceOrder): string | undefined {
    return command.quantity > 0 ? undefined : 'quantity must be positive';
  }
}

class KnownSkuRule implements IOrderRule {
  check(command: PlaceOrder): string | undefined {
    return command.sku.startsWith('sku-') ? undefined : `unknown sku '${command.sku}'`;
  }
}

class UnitOfWork {
  readonly changes: string[] = [];
  committed = false;
  disposed = false;

  record(change: string): void {
    this.changes.push(change);
  }

  commit(): void {
    this.committed = true;
  }

  dispose(): void {
    this.disposed = true;
  }
}

class AuditLog {
  readonly entries: string[] = [];
  closed = false;

  write(entry: string): void {
    this.entries.push(entry);
  }

  dispose(): void {
    this.closed = true;
  }
}

class PlaceOrderHandler implements ICommandHandler<PlaceOrder> {
  static inject = [UnitOfWork, collectionOf(IOrderRule)] as const;

  constructor(
    private readonly uow: UnitOfWork,
    private readonly rules: LazyCollection<IOrderRule>,
  ) {}

  async handle(command: PlaceOrder): Promise<string> {
    const violations: string[] = [];
    for (const rule of this.rules) {
      const violation = rule.check(command);
      if (violation) {
        violations.push(violation);
      }
    }
    if (violations.length > 0) {
      throw new Error(violations.join('; '));
    }
    await Promise.resolve();
    this.uow.record(`placed ${command.sku} x${command.quantity}`);
    return `placed ${command.sku}`;
  }
}

const TCommand = typeParam('TCommand');

class UnhandledCommandHandler<T> implements ICommandHandler<T> {
  static inject = [typeArgument(TCommand)] as const;

  constructor(private readonly commandType: ServiceKey) {}

  async handle(): Promise<string> {
    return `ignored ${describeKey(this.commandType)}`;
  }
}

class TransactionDecorator<T> implements ICommandHandler<T> {
  static inject = [Decoratee, UnitOfWork, AuditLog] as const;

  constructor(
    private readonly inner: ICommandHandler<T>,
    private readonly uow: UnitOfWork,
    private readonly audit: AuditLog,
  ) {}

  async handle(command: T): Promise<string> {
    const result = await this.inner.handle(command);
    this.uow.commit();
    this.audit.write(result);
    return result;
  }
}

// ============================================================================
// Composition
// ============================================================================

function compose(): Container {
  const container = new Container({
    name: 'orders',
    logger: silentLogger,
    defaultScopedLifestyle: new AsyncScopedLifestyle(),
  });

  container.registerScoped(UnitOfWork);
  container.registerSingleton(AuditLog);
  container.collection.register(IOrderRule, [PositiveQuantityRule, KnownSkuRule], ServiceLifetime.Singleton);
  container.register(ICommandHandler.of(PlaceOrder), PlaceOrderHandler);
  container.registerGeneric(ICommandHandler, UnhandledCommandHandler, {
    serves: ICommandHandler.pattern(TCommand),
  });
  container.registerDecorator(ICommandHandler, TransactionDecorator);

  return container;
}

const placeOrderHandler = ICommandHandler.of<ICommandHandler<PlaceOrder>>(PlaceOrder);
const cancelOrderHandler = ICommandHandler.of<ICommandHandler<CancelOrder>>(CancelOrder);

describe('Order Pipeline', () => {
  let container: Container;

  beforeEach(() => {
    container = compose();
  });

  it('should verify the composition', () => {
    container.verify();

    expect(container.isVerified).toBe(true);
    expect(container.getInstance(AuditLog).entries).toEqual([]);
  });

  it('should run a command in one unit of work', async () => {
    const { outcome, uow } = await AsyncScopedLifestyle.run(container, async () => {
      const handler = container.getInstance(placeOrderHandler);
      return { outcome: await handler.handle(new PlaceOrder('sku-1', 2)), uow: container.getInstance(UnitOfWork) };
    });

    expect(outcome).toBe('placed sku-1');
    expect(uow.changes).toEqual(['placed sku-1 x2']);
    expect(uow.committed).toBe(true);
    expect(uow.disposed).toBe(true);
    expect(container.getInstance(AuditLog).entries).toEqual(['placed sku-1']);
  });

  it('should give each command its own unit of work', async () => {
    const [first, second] = await Promise.all(
      ['sku-1', 'sku-2'].map((sku) =>
        AsyncScopedLifestyle.run(container, async () => {
          await container.getInstance(placeOrderHandler).handle(new PlaceOrder(sku, 1));
          return container.getInstance(UnitOfWork);
        }),
      ),
    );

    expect(first).not.toBe(second);
    expect(first.changes).toEqual(['placed sku-1 x1']);
    expect(second.changes).toEqual(['placed sku-2 x1']);
  });

  it('should roll back and still dispose when a rule fails', async () => {
    const units: UnitOfWork[] = [];

    const error = await captureRejection(() =>
      AsyncScopedLifestyle.run(container, async () => {
        units.push(container.getInstance(UnitOfWork));
        await container.getInstance(placeOrderHandler).handle(new PlaceOrder('book', 0));
      }),
    );

    expect(error instanceof Error && error.message).toBe("quantity must be positive; unknown sku 'book'");
    expect(units.map((uow) => [uow.committed, uow.disposed])).toEqual([[false, true]]);
  });

  it('should decorate the open-generic fallback as well', async () => {
    const outcome = await AsyncScopedLifestyle.run(container, () =>
      container.getInstance(cancelOrderHandler).handle(new CancelOrder('order-7')),
    );

    expect(outcome).toBe('ignored CancelOrder');
    expect(container.getInstance(AuditLog).entries).toEqual(['ignored CancelOrder']);
  });

  it('should refuse to run a command outside a scope', () => {
    const error = captureError(() => container.getInstance(placeOrderHandler));

    expect(error).toBeInstanceOf(ScopeViolationError);
    expect(error instanceof Error && error.message).toBe(
      "'UnitOfWork' is registered as Scoped, but the instance is requested outside the context of an active scope",
    );
  });

  it('should dispose singletons with the container', async () => {
    const audit = container.getInstance(AuditLog);

    await container.disposeAsync();

    expect(audit.closed).toBe(true);
  });
});
