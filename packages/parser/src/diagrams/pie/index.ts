export { parsePieChart } from "./parser";
export type { PieChart, PieSlice } from "./types";
