import Database from 'better-sqlite3';

export type FieldErrors = Record<string, string>;

export class ArchiveError extends Error {
  constructor(
    message: string,
    readonly status: 400 | 404 | 409 | 500,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** A write was refused because one or more values break a constraint. */
export class ValidationError extends ArchiveError {
  constructor(
    message: string,
    readonly fields: FieldErrors = {},
  ) {
    super(message, 400);
  }
}

export class NotFoundError extends ArchiveError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ConflictError extends ArchiveError {
  constructor(message: string) {
    super(message, 409);
  }
}

export class DuplicateImageError extends ConflictError {
  constructor(readonly md5Checksum: string) {
    super(`Duplicate MD5: ${md5Checksum}`);
  }
}

export class DatabaseError extends ArchiveError {
  constructor(message: string) {
    super(message, 500);
  }
}

type SqliteError = InstanceType<typeof Database.SqliteError>;

function findSqliteError(err: unknown): SqliteError | undefined {
  if (err instanceof Database.SqliteError) return err;
  if (err instanceof Error && err.cause instanceof Database.SqliteError) return err.cause;
  return undefined;
}

/**
 * Maps a failure raised by SQLite to the matching archive error.
 * `context` names the operation, e.g. "updating image 4".
 */
export function toArchiveError(err: unknown, context: string): ArchiveError {
  if (err instanceof ArchiveError) return err;

  const sqliteError = findSqliteError(err);
  if (sqliteError) {
    switch (sqliteError.code) {
      case 'SQLITE_CONSTRAINT_CHECK':
      case 'SQLITE_CONSTRAINT_NOTNULL':
        return new ValidationError(`Rejected by a storage constraint while ${context}: ${sqliteError.message}`);
      case 'SQLITE_CONSTRAINT_FOREIGNKEY':
        return new ConflictError(`Referenced record conflict while ${context}`);
      case 'SQLITE_CONSTRAINT_PRIMARYKEY':
      case 'SQLITE_CONSTRAINT_UNIQUE':
        return new ConflictError(`Record already exists while ${context}`);
      default:
        return new DatabaseError(`Error ${context}: ${sqliteError.message}`);
    }
  }

  const message = err instanceof Error ? err.message : String(err);
  return new DatabaseError(`Error ${context}: ${message}`);
}
