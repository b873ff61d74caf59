export class ErrorList extends Error {
  errors: Error[];

  constructor(msg: string, errors: Error[]) {
    super(msg);
    this.name = this.constructor.name;
    this.errors = errors;
    this.message = msg + ': ' + this.errors.map((e) => e.message).join(', ');
    this.stack = this.errors.map((e) => e.stack).join('\n\n');
  }
}

/** Coerce a thrown value into an Error */
export function toError(e: unknown): Error {
  if (e instanceof Error) return e;
  return new Error(String(e));
}
