/**
 * `true` picks the global `proxy` setting, a string is a proxy URL of its
 * own and `false` means a direct connection.
 */
export type UseProxy = boolean | string;

export function resolveUpstreamProxy(
  useProxy: UseProxy,
  globalProxy: string | undefined,
): string | undefined {
  if (typeof useProxy === 'string') {
    return useProxy;
  }
  if (!useProxy) {
    return undefined;
  }
  if (!globalProxy) {
    throw new Error(
      'Upstream proxy is enabled for a source but config.proxy is not set.',
    );
  }
  return globalProxy;
}
