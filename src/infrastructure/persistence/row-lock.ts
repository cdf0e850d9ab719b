import { EntityManager } from 'typeorm';

/**
 * 트랜잭션 안에서 최신 커밋을 읽어야 하는 조회에 붙이는 공유 락 옵션.
 * InnoDB의 일반 SELECT는 트랜잭션 스냅샷을 보므로 락 조회(LOCK IN SHARE MODE)로 읽는다.
 * SQLite는 쓰기 트랜잭션이 DB 전체를 잠그므로 옵션이 필요 없다.
 */
export const sharedRowLock = (manager: EntityManager) => {
  const { type } = manager.connection.options;
  return type === 'mysql' || type === 'mariadb' ? { lock: { mode: 'pessimistic_read' as const } } : {};
};
