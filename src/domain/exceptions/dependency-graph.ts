/**
 * @module sinew-di/domain/exceptions
 */

/**
 * Render a resolution path as the tree attached to resolution errors.
 *
 * @param chain - Consumers from the outermost request inwards
 * @param current - The failing service, already carrying its marker
 *
 * @example
 * ```typescript
 * formatDependencyGraph(['OrderController', 'OrderService'], 'IMailer (UNREGISTERED)');
 * // ├─ OrderController
 * //   └─ OrderService
 * //     └─ IMailer (UNREGISTERED)
 * ```
 */
export function formatDependencyGraph(chain: readonly string[], current: string): string {
  let graph = '';
  for (let i = 0; i < chain.length; i++) {
    const indent = '  '.repeat(i);
    const branch = i === chain.length - 1 ? '└─' : '├─';
    graph += `${indent}${branch} ${chain[i]}\n`;
  }
  const indent = '  '.repeat(chain.length);
  graph += `${indent}└─ ${current}\n`;
  return graph;
}

export const GraphMarker = {
  Unregistered: 'UNREGISTERED',
  Circular: 'CIRCULAR!',
  LifestyleMismatch: 'LIFESTYLE MISMATCH',
  Ambiguous: 'AMBIGUOUS',
  NoScope: 'NO ACTIVE SCOPE',
  ActivationFailed: 'ACTIVATION FAILED',
} as const;
