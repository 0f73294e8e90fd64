const ROOT = '$';
const MEMBER_PATTERN = /^[A-Za-z0-9_\-]+$/;

export class InvalidPathError extends Error {
  readonly member: string;

  constructor(member: string) {
    super(`Invalid path member "${member}"`);
    this.name = 'InvalidPathError';
    this.member = member;
  }
}

function assertMember(name: string): string {
  if (!MEMBER_PATTERN.test(name)) {
    throw new InvalidPathError(name);
  }
  return name;
}

/** Normalizes legacy `.Field` paths to `$.Field`. */
export function normalizePath(path: string): string {
  if (path.startsWith(ROOT)) {
    return path;
  }
  return path.startsWith('.') ? `${ROOT}${path}` : `${ROOT}.${path}`;
}

export function fieldPath(...members: string[]): string {
  return members.reduce((path, member) => `${path}.${assertMember(member)}`, ROOT);
}

export function wildcardPath(base: string): string {
  return `${base}.*`;
}

export function filterPath(base: string, attribute: string, value: string): string {
  return `${base}[?(@.${assertMember(attribute)}==${JSON.stringify(value)})]`;
}
