// Development-only diagnostics. Silent when NODE_ENV is 'production'.
export function warn(message: string, location?: readonly string[]): void {
  if (process.env.NODE_ENV === 'production') return
  const at = location && location.length > 0 ? ` (at template /${location.join('/')})` : ''
  console.warn(`[treeshape] ${message}${at}`)
}
