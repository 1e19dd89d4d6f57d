import { fileURLToPath } from 'url';

const TOP_LEVEL_SCOPES = new Set(['<module>', 'Object.<anonymous>']);
const ANONYMOUS_SCOPES = new Set(['<anonymous>', '<lambda>']);
const SHELL_SOURCES = /^(?:<stdin>|<anonymous>|\[eval\d*\]|REPL\d*|node:repl|evalmachine)/;
const SOURCE_EXTENSION = /\.(?:[cm]?[jt]s|[jt]sx)$/;
const DRIVE_PREFIX = /^[A-Za-z]:/;
const NODE_MODULES = /^.*[\\/]node_modules[\\/]/;

/** True for module-level code and unnamed functions. */
export function isAnonymousScope(func: string | undefined): boolean {
  return !func || TOP_LEVEL_SCOPES.has(func) || ANONYMOUS_SCOPES.has(func);
}

/**
 * Turn a source file and function into a dotted label, e.g.
 * `/repo/src/commands/run.ts` + `RunCommand.execute` ->
 * `src.commands.run.RunCommand.execute` when run from `/repo`.
 *
 * Installed code is labelled from its package directory. Input that is
 * already a dotted label comes back unchanged.
 */
export function toSourceLabel(
  file: string | undefined,
  func?: string,
  cwd: string = process.cwd(),
): string {
  if (!file || SHELL_SOURCES.test(file)) return 'shell';
  if (!/[\\/]/.test(file) && !SOURCE_EXTENSION.test(file)) return file;

  let modulePath = file.startsWith('file://') ? fileURLToPath(file) : file;
  modulePath = modulePath.replace(DRIVE_PREFIX, '');

  if (NODE_MODULES.test(modulePath)) {
    modulePath = modulePath.replace(NODE_MODULES, '');
  } else {
    const root = cwd.replace(DRIVE_PREFIX, '').replace(/[\\/]+$/, '');
    if (root && modulePath.startsWith(root) && /^[\\/]/.test(modulePath.slice(root.length))) {
      modulePath = modulePath.slice(root.length);
    }
  }

  let label = modulePath
    .replace(SOURCE_EXTENSION, '')
    .split(/[\\/]+/)
    .filter(Boolean)
    .join('.');
  if (!isAnonymousScope(func)) label += `.${func}`;
  return label;
}
