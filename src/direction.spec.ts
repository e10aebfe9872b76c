import { suite, test } from "node:test";
import assert from "node:assert";
import {
	DIRECTION,
	DIRECTIONS,
	dir2reverse,
	isDirection,
	text2dir,
} from "./direction.js";

suite("direction.ts", () => {
	suite("text2dir", () => {
		test("should accept full names in any case", () => {
			assert.strictEqual(text2dir("north"), DIRECTION.NORTH);
			assert.strictEqual(text2dir("SouthWest"), DIRECTION.SOUTHWEST);
			assert.strictEqual(text2dir(" down "), DIRECTION.DOWN);
		});

		test("should accept short forms", () => {
			assert.strictEqual(text2dir("n"), DIRECTION.NORTH);
			assert.strictEqual(text2dir("E"), DIRECTION.EAST);
			assert.strictEqual(text2dir("ne"), DIRECTION.NORTHEAST);
			assert.strictEqual(text2dir("u"), DIRECTION.UP);
		});

		test("should return undefined for non-directions", () => {
			assert.strictEqual(text2dir("sideways"), undefined);
			assert.strictEqual(text2dir(""), undefined);
			assert.strictEqual(text2dir("nor"), undefined);
		});
	});

	test("dir2reverse should pair every direction with its opposite", () => {
		for (const dir of DIRECTIONS) assert.strictEqual(dir2reverse(dir2reverse(dir)), dir);
		assert.strictEqual(dir2reverse(DIRECTION.NORTH), DIRECTION.SOUTH);
		assert.strictEqual(dir2reverse(DIRECTION.NORTHWEST), DIRECTION.SOUTHEAST);
		assert.strictEqual(dir2reverse(DIRECTION.UP), DIRECTION.DOWN);
	});

	test("isDirection should only accept full lowercase names", () => {
		assert.strictEqual(isDirection("east"), true);
		assert.strictEqual(isDirection("e"), false);
		assert.strictEqual(isDirection("East"), false);
	});
});
