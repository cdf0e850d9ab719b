import { QueryFailedError } from 'typeorm';
import {
  StorageUnavailableError,
  TransactionConflictError,
} from '../../common/errors/storage.errors';

export type StorageErrorKind =
  | 'unique-violation'
  | 'foreign-key-violation'
  | 'transaction-conflict'
  | 'unavailable'
  | 'unknown';

// MySQL / PostgreSQL / SQLite 드라이버 오류 코드
const UNIQUE_VIOLATION_CODES = new Set(['ER_DUP_ENTRY', '23505', 'SQLITE_CONSTRAINT_UNIQUE']);

const FOREIGN_KEY_VIOLATION_CODES = new Set([
  'ER_NO_REFERENCED_ROW_2',
  'ER_NO_REFERENCED_ROW',
  '23503',
  'SQLITE_CONSTRAINT_FOREIGNKEY',
]);

const TRANSACTION_CONFLICT_CODES = new Set([
  'ER_LOCK_DEADLOCK',
  'ER_LOCK_WAIT_TIMEOUT',
  '40001',
  '40P01',
  'SQLITE_BUSY',
]);

const UNAVAILABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'PROTOCOL_CONNECTION_LOST',
  'ER_CON_COUNT_ERROR',
  '57P01',
  '08006',
]);

const readCode = (value: unknown): string | undefined => {
  if (typeof value === 'object' && value !== null && 'code' in value) {
    const { code } = value;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

export function storageErrorCode(error: unknown): string | undefined {
  if (error instanceof QueryFailedError) {
    return readCode(error.driverError) ?? readCode(error);
  }
  return readCode(error);
}

export function classifyStorageError(error: unknown): StorageErrorKind {
  const code = storageErrorCode(error);
  if (!code) return 'unknown';
  if (UNIQUE_VIOLATION_CODES.has(code)) return 'unique-violation';
  if (FOREIGN_KEY_VIOLATION_CODES.has(code)) return 'foreign-key-violation';
  if (TRANSACTION_CONFLICT_CODES.has(code)) return 'transaction-conflict';
  if (UNAVAILABLE_CODES.has(code)) return 'unavailable';
  return 'unknown';
}

/**
 * 제약 위반을 제외한 저장소 오류를 저장소 중립 오류로 바꾼다.
 * 분류되지 않는 오류는 그대로 돌려준다.
 */
export function translateStorageError(error: unknown): unknown {
  switch (classifyStorageError(error)) {
    case 'transaction-conflict':
      return new TransactionConflictError(error);
    case 'unavailable':
      return new StorageUnavailableError(error);
    default:
      return error;
  }
}
