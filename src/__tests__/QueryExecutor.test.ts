import { openDatabase } from '../database/DatabaseService';
import { NoResultError, NonUniqueResultError, SqliteQueryExecutor } from '../database/QueryExecutor';
import { seedDefaultUsers } from './testHelpers';

describe('SqliteQueryExecutor', () => {
  function setup() {
    const db = openDatabase(':memory:');
    seedDefaultUsers(db);
    return new SqliteQueryExecutor(db);
  }

  it('getSingleResult retorna a única linha', () => {
    const executor = setup();
    const row = executor.getSingleResult('SELECT username, email FROM users WHERE username = ?', ['bob']);
    expect(row).toEqual({ username: 'bob', email: 'bob@example.com' });
  });

  it('getSingleResult lança NoResultError sem linhas', () => {
    const executor = setup();
    expect(() => executor.getSingleResult('SELECT username FROM users WHERE username = ?', ['ghost'])).toThrow(
      NoResultError,
    );
  });

  it('getSingleResult lança NonUniqueResultError com a contagem', () => {
    const executor = setup();
    let caught: unknown;
    try {
      executor.getSingleResult('SELECT username FROM users WHERE enabled = ?', [1]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(NonUniqueResultError);
    expect(caught instanceof NonUniqueResultError && caught.count).toBe(2);
  });

  it('getResultList retorna lista vazia quando não há linhas', () => {
    const executor = setup();
    expect(executor.getResultList('SELECT authority FROM authorities WHERE username = ?', ['bob'])).toEqual([]);
  });

  it('getResultList retorna todas as linhas', () => {
    const executor = setup();
    const rows = executor.getResultList(
      'SELECT authority FROM authorities WHERE username = ? ORDER BY authority',
      ['alice'],
    );
    expect(rows).toEqual([{ authority: 'ADMIN' }, { authority: 'USER' }]);
  });

  it('propaga erros do banco sem alteração', () => {
    const executor = setup();
    expect(() => executor.getResultList('SELECT * FROM nope WHERE x = ?', ['a'])).toThrow('no such table: nope');
  });
});
