export type { IDisposable, IAsyncDisposable } from './IDisposable';
export { isDisposable, isAsyncDisposable, isDisposableType } from './IDisposable';
