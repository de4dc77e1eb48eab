import { describe, test, expect } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import { buildDdlSections, emitDdl, emitPostLoad, sectionMarker } from './ddlEmitter';
import { parseDdl } from './ddlParser';
import { createSchemaModel } from './model';

const MUTUAL_DDL = [
  'CREATE TABLE `a` (`id` int NOT NULL, `b_id` int DEFAULT NULL, PRIMARY KEY (`id`), KEY `b_id` (`b_id`),',
  '  CONSTRAINT `a_b` FOREIGN KEY (`b_id`) REFERENCES `b` (`id`) ON DELETE CASCADE);',
  'CREATE TABLE `b` (`id` int NOT NULL, `a_id` int DEFAULT NULL, PRIMARY KEY (`id`), KEY `a_id` (`a_id`),',
  '  CONSTRAINT `b_a` FOREIGN KEY (`a_id`) REFERENCES `a` (`id`));',
].join('\n');

describe('emitDdl', () => {
  test('emits a sequence-backed table without engine options', async () => {
    const model = await parseDdl(
      'CREATE TABLE `t` (`id` int(11) NOT NULL AUTO_INCREMENT, PRIMARY KEY (`id`)) ENGINE=InnoDB;'
    );

    expect(emitDdl(model)).toBe([
      '-- ===== SEQUENCES =====',
      'CREATE SEQUENCE t_id_seq;',
      '',
      '-- ===== TABLES =====',
      `CREATE TABLE "t" ("id" integer DEFAULT nextval('t_id_seq') NOT NULL, PRIMARY KEY ("id"));`,
      '',
      '-- ===== INDEXES =====',
      '',
      '-- ===== FOREIGN KEYS =====',
      '',
      '-- ===== COMMENTS =====',
      '',
    ].join('\n'));
  });

  test('places mutual foreign keys after every table', async () => {
    const ddl = emitDdl(await parseDdl(MUTUAL_DDL));

    expect(ddl.split('\n\n')).toEqual([
      '-- ===== SEQUENCES =====',
      [
        '-- ===== TABLES =====',
        'CREATE TABLE "a" ("id" integer NOT NULL, "b_id" integer DEFAULT NULL, PRIMARY KEY ("id"));',
        'CREATE TABLE "b" ("id" integer NOT NULL, "a_id" integer DEFAULT NULL, PRIMARY KEY ("id"));',
      ].join('\n'),
      [
        '-- ===== INDEXES =====',
        'CREATE INDEX "b_id" ON "a" ("b_id");',
        'CREATE INDEX "a_id" ON "b" ("a_id");',
      ].join('\n'),
      [
        '-- ===== FOREIGN KEYS =====',
        'ALTER TABLE "a" ADD CONSTRAINT "a_b" FOREIGN KEY ("b_id") REFERENCES "b" ("id") ON DELETE CASCADE;',
        'ALTER TABLE "b" ADD CONSTRAINT "b_a" FOREIGN KEY ("a_id") REFERENCES "a" ("id");',
      ].join('\n'),
      '-- ===== COMMENTS =====\n',
    ]);
  });

  test('only references tables created in the TABLES phase', async () => {
    const sections = buildDdlSections(await parseDdl(MUTUAL_DDL));
    const created = sections[1].statements.map(s => /^CREATE TABLE "([^"]+)"/.exec(s)?.[1]);
    const referenced = sections[3].statements.flatMap(s => {
      const match = /^ALTER TABLE "([^"]+)" .* REFERENCES "([^"]+)"/.exec(s);
      return match ? [match[1], match[2]] : [];
    });

    expect(sections.map(s => s.phase)).toEqual(['SEQUENCES', 'TABLES', 'INDEXES', 'FOREIGN KEYS', 'COMMENTS']);
    expect(referenced).toEqual(['a', 'b', 'b', 'a']);
    expect(referenced.every(name => created.includes(name))).toBe(true);
  });

  test('mutually referencing tables load into PostgreSQL', async () => {
    const db = new PGlite();
    await db.exec(emitDdl(await parseDdl(MUTUAL_DDL)));

    const result = await db.query<{ conname: string }>(
      "SELECT conname FROM pg_constraint WHERE contype = 'f' ORDER BY conname"
    );
    expect(result.rows.map(r => r.conname)).toEqual(['a_b', 'b_a']);
    await db.close();
  });

  test('emits comments last, with escaped text', () => {
    const model = createSchemaModel([], {
      comments: [
        { target: 'table', table: 'T', text: "Bob's table" },
        { target: 'column', table: 'T', column: 'c', text: 'plain' },
      ],
    });

    expect(buildDdlSections(model)[4].statements).toEqual([
      `COMMENT ON TABLE "T" IS 'Bob''s table';`,
      `COMMENT ON COLUMN "T"."c" IS 'plain';`,
    ]);
  });

  test('is byte-identical across runs', async () => {
    const sql = MUTUAL_DDL + "\nCREATE TABLE `c` (`id` int AUTO_INCREMENT, `s` enum('x','y'), PRIMARY KEY (`id`));";

    expect(emitDdl(await parseDdl(sql))).toBe(emitDdl(await parseDdl(sql)));
  });

  test('enum checks and defaults work in PostgreSQL', async () => {
    const db = new PGlite();
    await db.exec(emitDdl(await parseDdl([
      'CREATE TABLE `users` (',
      "  `id` bigint unsigned NOT NULL AUTO_INCREMENT COMMENT 'Primary id',",
      '  `email` varchar(191) NOT NULL,',
      "  `status` enum('active','banned') NOT NULL DEFAULT 'active',",
      "  `flag` bit(1) DEFAULT b'0',",
      '  `created_at` datetime(3) NOT NULL DEFAULT CURRENT_TIMESTAMP(3),',
      '  PRIMARY KEY (`id`),',
      '  UNIQUE KEY `users_email` (`email`)',
      ") ENGINE=InnoDB COMMENT='Registered users';",
    ].join('\n'))));

    const inserted = await db.query<{ id: number; status: string; flag: boolean }>(
      "INSERT INTO users (email) VALUES ('a@example.com') RETURNING id::int AS id, status, flag"
    );
    expect(inserted.rows).toEqual([{ id: 1, status: 'active', flag: false }]);
    await expect(db.query("INSERT INTO users (email, status) VALUES ('b@example.com', 'other')")).rejects.toThrow();
    await expect(db.query("INSERT INTO users (email) VALUES ('a@example.com')")).rejects.toThrow();

    const comment = await db.query<{ text: string }>("SELECT obj_description('users'::regclass, 'pg_class') AS text");
    expect(comment.rows).toEqual([{ text: 'Registered users' }]);
    await db.close();
  });
});

describe('emitPostLoad', () => {
  test('moves each sequence past the loaded maximum', async () => {
    const model = await parseDdl('CREATE TABLE `t` (`id` int NOT NULL AUTO_INCREMENT, PRIMARY KEY (`id`));');

    expect(emitPostLoad(model)).toBe([
      '-- ===== SEQUENCE VALUES =====',
      'ALTER SEQUENCE t_id_seq OWNED BY "t"."id";',
      `SELECT setval('t_id_seq', COALESCE((SELECT MAX("id") FROM "t"), 0) + 1, false);`,
      '',
    ].join('\n'));

    const db = new PGlite();
    await db.exec(emitDdl(model));
    await db.exec('INSERT INTO t (id) VALUES (1), (2), (7);');
    await db.exec(emitPostLoad(model));

    const next = await db.query<{ v: number }>("SELECT nextval('t_id_seq')::int AS v");
    expect(next.rows).toEqual([{ v: 8 }]);
    await db.close();
  });

  test('starts an empty table at 1', async () => {
    const model = await parseDdl('CREATE TABLE `e` (`n` int AUTO_INCREMENT, PRIMARY KEY (`n`));');
    const db = new PGlite();
    await db.exec(emitDdl(model));
    await db.exec(emitPostLoad(model));

    const next = await db.query<{ v: number }>("SELECT nextval('e_n_seq')::int AS v");
    expect(next.rows).toEqual([{ v: 1 }]);
    await db.close();
  });
});

describe('sectionMarker', () => {
  test('formats phase markers', () => {
    expect(sectionMarker('FOREIGN KEYS')).toBe('-- ===== FOREIGN KEYS =====');
  });
});
