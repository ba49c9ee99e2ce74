import { openDatabase } from '../database/DatabaseService';

describe('DatabaseService', () => {
  it('cria as tabelas users e authorities', () => {
    const db = openDatabase(':memory:');
    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all() as Array<{ name: string }>;
    expect(tables.map(t => t.name)).toEqual(['authorities', 'users']);
  });

  it('não cria usuários iniciais', () => {
    const db = openDatabase(':memory:');
    const row = db.prepare('SELECT COUNT(*) AS count FROM users').get() as { count: number };
    expect(row.count).toBe(0);
  });

  it('rejeita authority de usuário inexistente (foreign key)', () => {
    const db = openDatabase(':memory:');
    expect(() =>
      db.prepare('INSERT INTO authorities (username, authority) VALUES (?, ?)').run('ghost', 'ADMIN'),
    ).toThrow('FOREIGN KEY constraint failed');
  });
});
