import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { openDatabase } from '../../server/src/db/index.js';
import { ConflictError, ValidationError, toArchiveError } from '../../server/src/errors.js';
import { checksum } from './fixtures.js';

describe('archive schema constraints', () => {
    let sqlite: Database.Database;

    const insertImage = (values: {
        md5?: string;
        isRaw?: number;
        parentId?: number | null;
        dateTaken?: string | null;
        rotation?: number;
        pipelineVersion?: string | null;
    }) =>
        sqlite
            .prepare(
                `INSERT INTO images (filename, file_path, md5_checksum, is_raw, parent_image_id, date_taken, rotation_degrees, pipeline_version)
                 VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
            )
            .run(
                'DSC_0001.NEF',
                'raw/DSC_0001.NEF',
                values.md5 ?? checksum(1),
                values.isRaw ?? 1,
                values.parentId ?? null,
                values.dateTaken ?? null,
                values.rotation ?? 0,
                values.pipelineVersion ?? null,
            );

    beforeEach(() => {
        sqlite = openDatabase(':memory:').sqlite;
    });

    afterEach(() => {
        sqlite.close();
    });

    it('creates every table', () => {
        const tables = sqlite
            .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
            .all()
            .map((row) => row.name);
        expect(tables).toEqual(expect.arrayContaining(['images', 'painting_images', 'paintings', 'ratings']));
    });

    it('accepts a well-formed raw image', () => {
        const result = insertImage({ dateTaken: '2024-05-01T09:30:00', pipelineVersion: 'v0.1.0' });
        expect(result.changes).toBe(1);
    });

    it('rejects checksums that are not 32 hexadecimal characters', () => {
        expect(() => insertImage({ md5: 'g'.repeat(32) })).toThrow(/CHECK constraint failed/);
        expect(() => insertImage({ md5: 'abc' })).toThrow(/CHECK constraint failed/);
    });

    it('rejects malformed timestamps, rotations and versions', () => {
        expect(() => insertImage({ dateTaken: '2024-05-01 09:30:00' })).toThrow(/CHECK constraint failed/);
        expect(() => insertImage({ dateTaken: '2024-13-40T00:00:00' })).toThrow(/CHECK constraint failed/);
        expect(() => insertImage({ dateTaken: '2024-05-01T09:30:00Z' })).toThrow(/CHECK constraint failed/);
        expect(() => insertImage({ rotation: 361 })).toThrow(/CHECK constraint failed/);
        expect(() => insertImage({ pipelineVersion: '1.2.3' })).toThrow(/CHECK constraint failed/);
    });

    it('ties is_raw to the presence of a parent', () => {
        const parent = insertImage({});
        const parentId = Number(parent.lastInsertRowid);

        expect(() => insertImage({ md5: checksum(2), isRaw: 1, parentId })).toThrow(/CHECK constraint failed/);
        expect(() => insertImage({ md5: checksum(3), isRaw: 0, parentId: null })).toThrow(/CHECK constraint failed/);
        expect(insertImage({ md5: checksum(4), isRaw: 0, parentId }).changes).toBe(1);
    });

    it('enforces foreign keys', () => {
        expect(() => insertImage({ md5: checksum(2), isRaw: 0, parentId: 999 })).toThrow(/FOREIGN KEY constraint failed/);
    });

    it('stamps ratings with an archive timestamp and bounds the score', () => {
        insertImage({});
        sqlite.prepare('INSERT INTO paintings (name) VALUES (?)').run('Harbour at dusk');

        sqlite.prepare('INSERT INTO ratings (painting_id, image_id, score) VALUES (1, 1, 4)').run();
        const rating = sqlite.prepare<[], { rating_date: string }>('SELECT rating_date FROM ratings').get();
        expect(rating?.rating_date).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/);

        expect(() => sqlite.prepare('INSERT INTO ratings (painting_id, image_id, score) VALUES (1, 1, 6)').run()).toThrow(
            /CHECK constraint failed/,
        );
    });

    it('maps storage failures to archive errors', () => {
        const failure = (fn: () => unknown): unknown => {
            try {
                fn();
            } catch (e) {
                return e;
            }
            return undefined;
        };

        const check = toArchiveError(failure(() => insertImage({ rotation: 400 })), 'inserting image');
        expect(check).toBeInstanceOf(ValidationError);
        expect(check.status).toBe(400);

        const foreignKey = toArchiveError(failure(() => insertImage({ isRaw: 0, parentId: 42 })), 'inserting image');
        expect(foreignKey).toBeInstanceOf(ConflictError);
        expect(foreignKey.status).toBe(409);
    });

    it('keeps existing rows when a database file is reopened', () => {
        const dir = mkdtempSync(join(tmpdir(), 'archive-schema-'));
        try {
            const dbPath = join(dir, 'nested', 'archive.db');
            const first = openDatabase(dbPath);
            first.sqlite.prepare('INSERT INTO paintings (name) VALUES (?)').run('Still life');
            first.sqlite.close();

            const second = openDatabase(dbPath);
            const row = second.sqlite.prepare<[], { n: number }>('SELECT count(*) AS n FROM paintings').get();
            second.sqlite.close();
            expect(row?.n).toBe(1);
        } finally {
            rmSync(dir, { recursive: true, force: true });
        }
    });
});
