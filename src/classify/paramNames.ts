/** `base`, or `base` with trailing underscores until it is not in `taken`. */
export function freeName(base: string, taken: ReadonlySet<string>): string {
  let name = base;
  while (taken.has(name)) name = `${name}_`;
  return name;
}
