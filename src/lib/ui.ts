// Browser confirm, replaceable in tests.
export function confirmSync(message: string): boolean {
  try {
    return window.confirm(message);
  } catch {
    return false;
  }
}
