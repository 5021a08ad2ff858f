export type KubectlTool = 'kubectl' | 'oc';

export interface KubectlTarget {
  tool: KubectlTool;
  verbose: boolean;
  context: string;
  namespace: string;
}

/** Argument vector for running the cluster CLI against one context and namespace. */
export function buildKubectlArgv(target: KubectlTarget, args: readonly string[]): string[] {
  const argv: string[] = [target.tool];
  if (target.verbose) {
    argv.push('--v=4');
  }
  argv.push('--context', target.context);
  argv.push('--namespace', target.namespace);
  return [...argv, ...args];
}
