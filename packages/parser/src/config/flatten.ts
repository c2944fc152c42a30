import type { ConfigObject } from "./object-literal";

/**
 * Flatten nested theme variables into dotted keys.
 *
 * `{ xyChart: { titleFontSize: "20" } }` becomes `xyChart.titleFontSize -> "20"`.
 * Later keys overwrite earlier ones with the same flattened name.
 */
export function flattenThemeVariables(object: ConfigObject, prefix = ""): Map<string, string> {
	const flat = new Map<string, string>();

	for (const [key, value] of object) {
		const name = `${prefix}${key}`;
		if (typeof value === "string") {
			flat.set(name, value);
		} else {
			for (const [nestedKey, nestedValue] of flattenThemeVariables(value, `${name}.`)) {
				flat.set(nestedKey, nestedValue);
			}
		}
	}

	return flat;
}
