/**
 * Readiness check for services without a dedicated client.
 * True only when `GET {baseUrl}{path}` answers 200.
 */
export async function checkHealth(
  baseUrl: string,
  path: string,
  fetchFn: typeof fetch = fetch,
): Promise<boolean> {
  const response = await fetchFn(new URL(`${baseUrl.replace(/\/+$/, '')}${path}`));
  // Release the connection; only the status matters
  await response.body?.cancel();
  return response.status === 200;
}
