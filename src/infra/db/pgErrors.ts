import {
  ConflictError,
  InternalError,
  UnavailableError,
} from '../../application/errors.js';

// SQLSTATE codes and classes: https://www.postgresql.org/docs/current/errcodes-appendix.html
const UNIQUE_VIOLATION = '23505';
const UNAVAILABLE_SQLSTATE_CLASSES = ['08', '53'];
const UNAVAILABLE_SQLSTATES = new Set(['57P01', '57P02', '57P03', '57014']);

const UNAVAILABLE_SYSCALL_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'EPIPE',
]);

// node-postgres raises these without a code
const UNAVAILABLE_MESSAGES = [
  'timeout exceeded when trying to connect',
  'Connection terminated',
  'Client has encountered a connection error',
];

const CONSTRAINT_FIELDS: Record<string, string> = {
  users_username_key: 'username',
  users_email_key: 'email',
};

function stringProp(err: Error, key: 'code' | 'constraint'): string | undefined {
  if (key in err) {
    const value: unknown = Reflect.get(err, key);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

/**
 * Translate anything node-postgres throws into an application error.
 * The raw error is kept as `cause` for logging, never for the response.
 */
export function classifyPgError(err: unknown): Error {
  if (!(err instanceof Error)) {
    return new InternalError('Unexpected database failure', { cause: err });
  }

  const code = stringProp(err, 'code');

  if (code === UNIQUE_VIOLATION) {
    const constraint = stringProp(err, 'constraint');
    const field = constraint ? CONSTRAINT_FIELDS[constraint] : undefined;
    return new ConflictError(
      field ? `${field} already exists` : 'Record already exists',
      field
    );
  }

  if (
    code !== undefined &&
    (UNAVAILABLE_SYSCALL_CODES.has(code) ||
      UNAVAILABLE_SQLSTATES.has(code) ||
      UNAVAILABLE_SQLSTATE_CLASSES.some((cls) => code.length === 5 && code.startsWith(cls)))
  ) {
    return new UnavailableError('Database unavailable', { cause: err });
  }

  if (UNAVAILABLE_MESSAGES.some((prefix) => err.message.startsWith(prefix))) {
    return new UnavailableError('Database unavailable', { cause: err });
  }

  return new InternalError('Unexpected database failure', { cause: err });
}
