import { ConfigError } from './errors.js';

function normalizeMountPath(mountPath: string): string {
  const withSlash = mountPath.startsWith('/') ? mountPath : `/${mountPath}`;
  return withSlash === '/' ? '' : withSlash.replace(/\/+$/, '');
}

/**
 * Joins the server URL and the MCP mount path. A URL that already ends with
 * the mount path is returned as is; the query string is kept.
 */
export function resolveEndpoint(baseUrl: string, mountPath: string): string {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl.trim());
  } catch {
    throw new ConfigError(`Invalid MCP server URL: ${baseUrl}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError(`MCP server URL must use http or https: ${baseUrl}`);
  }

  const mount = normalizeMountPath(mountPath);
  const currentPath = parsed.pathname.replace(/\/+$/, '');
  if (mount && !currentPath.endsWith(mount)) {
    parsed.pathname = `${currentPath}${mount}`.replace(/\/{2,}/g, '/');
  } else {
    parsed.pathname = currentPath || '/';
  }
  const joined = parsed.toString();
  return parsed.search || parsed.pathname !== '/' ? joined : joined.replace(/\/$/, '');
}
