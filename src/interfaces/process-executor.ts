/**
 * IProcessExecutor: hands the terminal over to another program.
 * `exec` never returns: the current process ends with the program's status.
 */
export interface IProcessExecutor {
  exec(bin: string, args: readonly string[]): never;
}
