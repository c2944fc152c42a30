import type { PieChart } from "./diagrams/pie/types";
import type { WorkItemMovement } from "./diagrams/work-item-movement/types";
import type { XYChart } from "./diagrams/xychart/types";

/**
 * Any parsed chart, discriminated on `type`.
 */
export type ChartDocument = PieChart | XYChart | WorkItemMovement;
