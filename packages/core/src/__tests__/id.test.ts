import { describe, expect, it } from "vitest";
import { generateId, isRecordId } from "../utils/id.js";

describe("generateId", () => {
	it("returns a UUID v4", () => {
		const uuidV4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
		expect(generateId()).toMatch(uuidV4);
	});

	it("returns unique ids", () => {
		const ids = new Set(Array.from({ length: 100 }, () => generateId()));
		expect(ids.size).toBe(100);
	});
});

describe("isRecordId", () => {
	it("accepts generated ids in either case", () => {
		const id = generateId();
		expect(isRecordId(id)).toBe(true);
		expect(isRecordId(id.toUpperCase())).toBe(true);
	});

	it.each(["acc1", "", "3f2b8c1e-9d4a-4f6b-8e2d-1a5c7b9e0f3", " 3f2b8c1e-9d4a-4f6b-8e2d-1a5c7b9e0f31"])(
		"rejects %j",
		(value) => {
			expect(isRecordId(value)).toBe(false);
		},
	);
});
