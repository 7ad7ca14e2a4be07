export function timestamp(): string {
  return new Date().toLocaleTimeString();
}
