import type { NamedDependency } from '../../report/reportTypes.js';

/** `{A, B}` */
export function formatAttributes(names: readonly string[]): string {
  return `{${names.join(', ')}}`;
}

/** `{A, B} → {C}` */
export function formatDependency(fd: NamedDependency): string {
  return `${formatAttributes(fd.determinant)} → ${formatAttributes(fd.dependent)}`;
}
