export { parseXYChart } from "./parser";
export { validateXYChart } from "./validator";
export type { Series, SeriesKind, XAxis, XYChart, YAxis } from "./types";
