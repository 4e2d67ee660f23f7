/**
 * Host operating system, as far as shell conventions are concerned.
 *
 * Passed explicitly into the registry and the script builder instead of being
 * read from `process.platform`, so both tables can be exercised in one process.
 */
export type HostPlatform =
  | { readonly kind: 'windows' }
  | { readonly kind: 'posix'; readonly bsd: boolean };

export const WINDOWS_HOST: HostPlatform = { kind: 'windows' };
export const POSIX_HOST: HostPlatform = { kind: 'posix', bsd: false };

export function hostPlatformFrom(platform: NodeJS.Platform): HostPlatform {
  if (platform === 'win32') return WINDOWS_HOST;
  return { kind: 'posix', bsd: platform.includes('bsd') };
}

export function isWindowsHost(host: HostPlatform): boolean {
  return host.kind === 'windows';
}
