import type { Queryable } from './index';

type Column<Row> = Extract<keyof Row, string>;

/**
 * Typed single-table access shared by the repositories. Table and column
 * names come from code, never from input; only values are parameterised.
 */
export class PgTable<Row> {
    constructor(
        private readonly db: Queryable,
        readonly name: string
    ) {}

    async findOneBy<K extends Column<Row>>(column: K, value: Row[K]): Promise<Row | null> {
        const rows = await this.db.query<Row>(
            `SELECT * FROM ${this.name} WHERE ${column} = $1 LIMIT 1`,
            [value]
        );
        return rows[0] ?? null;
    }

    async insert(values: Partial<Row>): Promise<Row> {
        const entries = Object.entries(values).filter(([, v]) => v !== undefined);
        const columns = entries.map(([column]) => column).join(', ');
        const placeholders = entries.map((_, i) => `$${i + 1}`).join(', ');
        const rows = await this.db.query<Row>(
            `INSERT INTO ${this.name} (${columns}) VALUES (${placeholders}) RETURNING *`,
            entries.map(([, v]) => v)
        );
        const row = rows[0];
        if (!row) throw new Error(`INSERT INTO ${this.name} returned no row`);
        return row;
    }

    async updateBy<K extends Column<Row>>(
        column: K,
        value: Row[K],
        changes: Partial<Row>
    ): Promise<Row[]> {
        const entries = Object.entries(changes).filter(([, v]) => v !== undefined);
        const assignments = entries.map(([c], i) => `${c} = $${i + 2}`).join(', ');
        return this.db.query<Row>(
            `UPDATE ${this.name} SET ${assignments} WHERE ${column} = $1 RETURNING *`,
            [value, ...entries.map(([, v]) => v)]
        );
    }
}
