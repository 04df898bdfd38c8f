export function setHeaderIfMissing(
  headers: Headers,
  key: string,
  value: string,
): void {
  if (headers.has(key)) return

  headers.set(key, value)
}
