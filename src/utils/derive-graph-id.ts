/**
 * Converts a PascalCase class name to a snake_case graph id, dropping a
 * trailing "Graph". E.g., "CustomerServiceGraph" -> "customer_service"
 */
export function deriveGraphId(className: string): string {
  const base =
    className.endsWith('Graph') && className !== 'Graph'
      ? className.slice(0, -'Graph'.length)
      : className;

  return base
    .replace(/([A-Z])/g, '_$1')
    .toLowerCase()
    .replace(/^_/, '');
}
