import { describe, expect, it } from "vitest";
import { parseWorkItemMovement } from "../../../src/diagrams/work-item-movement/parser";
import { pointsChange } from "../../../src/diagrams/work-item-movement/types";

const SPRINT = `work-item-movement
  title 'Sprint movement'
  columns [To Do, In Progress, Done]
  NP-213 To Do: 3 -> In Progress: 5
  NP-341 Done: 8 ->  done: 2
`;

describe("parseWorkItemMovement", () => {
	describe("Feature: Full chart", () => {
		it("should parse title, columns and items", () => {
			const chart = parseWorkItemMovement(SPRINT);

			expect(chart.title).toBe("Sprint movement");
			expect(chart.columns).toEqual(["To Do", "In Progress", "Done"]);
			expect(chart.items).toEqual([
				{ id: "NP-213", fromState: "To Do", fromPoints: 3, toState: "In Progress", toPoints: 5 },
				{ id: "NP-341", fromState: "Done", fromPoints: 8, toState: "done", toPoints: 2 },
			]);
		});

		it("should accept a double-quoted title and no items", () => {
			const chart = parseWorkItemMovement('work-item-movement\ntitle "Empty"\ncolumns [A]');

			expect(chart.title).toBe("Empty");
			expect(chart.items).toEqual([]);
		});

		it("should leave unknown columns to validation", () => {
			const chart = parseWorkItemMovement("work-item-movement\ncolumns [A]\nX-1 Z: 1 -> A: 1");

			expect(chart.items[0]?.fromState).toBe("Z");
		});
	});

	describe("Feature: Points change", () => {
		it("should subtract from-points from to-points", () => {
			const [raised, dropped] = parseWorkItemMovement(SPRINT).items;

			expect(raised && pointsChange(raised)).toBe(2);
			expect(dropped && pointsChange(dropped)).toBe(-6);
		});
	});

	describe("Feature: Errors", () => {
		it("should require the columns line", () => {
			expect(() => parseWorkItemMovement("work-item-movement\nNP-1 A: 1 -> B: 2")).toThrow(
				"Failed to parse work item movement chart: expected 'columns'",
			);
		});

		it("should reject an id without digits", () => {
			expect(() => parseWorkItemMovement("work-item-movement\ncolumns [A]\nNP A: 1 -> A: 2")).toThrow(
				'expected work item id such as ABC-123 at "NP A: 1 -> A: 2"',
			);
		});

		it("should reject negative points", () => {
			expect(() => parseWorkItemMovement("work-item-movement\ncolumns [A]\nNP-1 A: -1 -> A: 2")).toThrow(
				"expected story points",
			);
		});

		it("should not let a state run onto the next line", () => {
			expect(() => parseWorkItemMovement("work-item-movement\ncolumns [A]\nNP-1 A\nB: 1 -> A: 2")).toThrow(
				"expected ':' after state",
			);
		});
	});
});
