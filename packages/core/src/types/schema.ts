export interface ColumnDefinition {
	type: "text" | "integer" | "bigint" | "timestamp" | "uuid";
	primaryKey?: boolean;
	notNull?: boolean;
	default?: string;
	/** SQL boolean expression over this table's columns, emitted as a CHECK constraint. */
	check?: string;
	/** Foreign key. Deletes of the referenced row are restricted. */
	references?: { table: string; column: string };
}

export interface TableDefinition {
	columns: Record<string, ColumnDefinition>;
	indexes?: Array<{
		name: string;
		columns: string[];
		unique?: boolean;
	}>;
}
