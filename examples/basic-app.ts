/**
 * sinew-di v1.0.0 - Basic Example
 *
 * Demonstrates the core container concepts:
 * - Tokens for interfaces and open generics for handler families
 * - A decorator wrapped around every command handler
 * - A lazy collection of validation rules
 * - A unit of work per async scope
 * - Verification before the first request
 */

import 'reflect-metadata';
import {
  AsyncScopedLifestyle,
  Container,
  Decoratee,
  DiagnosticSeverity,
  ServiceLifetime,
  collectionOf,
  createConsoleLogger,
  createToken,
  defineGeneric,
  describeKey,
  typeArgument,
  typeParam,
  LogLevel,
} from '../src';
import type { LazyCollection, ServiceKey } from '../src';

// ============================================================================
// Contracts
// ============================================================================

interface ICommandHandler<TCommand> {
  handle(command: TCommand): Promise<string>;
}
const ICommandHandler = defineGeneric('ICommandHandler', 1);

interface IRule<TCommand> {
  check(command: TCommand): string | undefined;
}
const IRegistrationRule = createToken<IRule<RegisterUser>>('IRegistrationRule');

interface IClock {
  now(): Date;
}
const IClock = createToken<IClock>('IClock');

// ============================================================================
// Commands
// ============================================================================

class RegisterUser {
  constructor(
    readonly email: string,
    readonly displayName: string,
  ) {}
}

class DeactivateUser {
  constructor(readonly userId: string) {}
}

// ============================================================================
// Services
// ============================================================================

class SystemClock implements IClock {
  now(): Date {
    return new Date();
  }
}

/**
 * Collects changes for one request and flushes them when the scope ends.
 */
class UnitOfWork {
  private readonly pending: string[] = [];

  add(change: string): void {
    this.pending.push(change);
  }

  async disposeAsync(): Promise<void> {
    if (this.pending.length > 0) {
      console.log(`  💾 Flushing ${this.pending.length} change(s): ${this.pending.join(', ')}`);
    }
  }
}

class EmailRule implements IRule<RegisterUser> {
  check(command: RegisterUser): string | undefined {
    return command.email.includes('@') ? undefined : `'${command.email}' is not an email address`;
  }
}

class DisplayNameRule implements IRule<RegisterUser> {
  check(command: RegisterUser): string | undefined {
    return command.displayName.trim().length > 0 ? undefined : 'display name is required';
  }
}

// ============================================================================
// Handlers
// ============================================================================

class RegisterUserHandler implements ICommandHandler<RegisterUser> {
  static inject = [UnitOfWork, IClock, collectionOf(IRegistrationRule)] as const;

  constructor(
    private readonly uow: UnitOfWork,
    private readonly clock: IClock,
    private readonly rules: LazyCollection<IRule<RegisterUser>>,
  ) {}

  async handle(command: RegisterUser): Promise<string> {
    for (const rule of this.rules) {
      const violation = rule.check(command);
      if (violation) {
        throw new Error(violation);
      }
    }
    this.uow.add(`user ${command.email} at ${this.clock.now().toISOString()}`);
    return `registered ${command.email}`;
  }
}

const TCommand = typeParam('TCommand');

/** Serves every command that has no handler of its own */
class NotSupportedHandler<T> implements ICommandHandler<T> {
  static inject = [typeArgument(TCommand)] as const;

  constructor(private readonly commandType: ServiceKey) {}

  async handle(): Promise<string> {
    return `${describeKey(this.commandType)} is not supported yet`;
  }
}

class TimingDecorator<T> implements ICommandHandler<T> {
  static inject = [Decoratee] as const;

  constructor(private readonly inner: ICommandHandler<T>) {}

  async handle(command: T): Promise<string> {
    const started = Date.now();
    try {
      return await this.inner.handle(command);
    } finally {
      console.log(`  ⏱️  ${Date.now() - started}ms`);
    }
  }
}

// ============================================================================
// Composition Root
// ============================================================================

function compose(): Container {
  const container = new Container({
    name: 'users',
    defaultScopedLifestyle: new AsyncScopedLifestyle(),
    logger: createConsoleLogger({ level: LogLevel.Info, prefix: 'users' }),
  });

  container.registerSingleton(IClock, SystemClock);
  container.registerScoped(UnitOfWork);
  container.collection.register(IRegistrationRule, [EmailRule, DisplayNameRule], ServiceLifetime.Singleton);

  container.register(ICommandHandler.of(RegisterUser), RegisterUserHandler);
  container.registerGeneric(ICommandHandler, NotSupportedHandler, {
    serves: ICommandHandler.pattern(TCommand),
  });
  container.registerDecorator(ICommandHandler, TimingDecorator);

  return container;
}

async function dispatch<T>(container: Container, type: ServiceKey<ICommandHandler<T>>, command: T): Promise<void> {
  try {
    const outcome = await AsyncScopedLifestyle.run(container, () => container.getInstance(type).handle(command));
    console.log(`  ✅ ${outcome}`);
  } catch (error) {
    console.log(`  ❌ ${error instanceof Error ? error.message : String(error)}`);
  }
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  console.log('🔧 Composing container...');
  const container = compose();

  const findings = container.analyze().filter((result) => result.severity !== DiagnosticSeverity.Information);
  console.log(`🔍 ${findings.length} diagnostic finding(s)`);
  container.verify();

  const registerUser = ICommandHandler.of<ICommandHandler<RegisterUser>>(RegisterUser);
  const deactivateUser = ICommandHandler.of<ICommandHandler<DeactivateUser>>(DeactivateUser);

  console.log('\n📨 RegisterUser (valid)');
  await dispatch(container, registerUser, new RegisterUser('ada@example.com', 'Ada'));

  console.log('\n📨 RegisterUser (invalid)');
  await dispatch(container, registerUser, new RegisterUser('not-an-email', 'Bob'));

  console.log('\n📨 DeactivateUser');
  await dispatch(container, deactivateUser, new DeactivateUser('user-1'));

  await container.disposeAsync();
  console.log('\n👋 Container disposed');
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
