/**
 * Work Item Movement Layout Engine
 *
 * Columns are vertical guide lines spread across the canvas; each item takes
 * one row, drawn as two point circles joined by an arrow. A move within one
 * column stacks its circles vertically and takes a taller row.
 */

import { pointsChange, type WorkItem, type WorkItemMovement } from '@chartscript/parser';
import type { Point } from '../document/document';
import { WORK_ITEM_FONT_SIZES } from '../themes/default';
import type { LayoutContext } from './context';

// ---- Layout result types ----

export interface ColumnLayout {
  name: string;
  x: number;
  labelY: number;
  /** Guide line extent */
  top: number;
  bottom: number;
}

export interface ItemCircleLayout extends Point {
  points: number;
}

export interface WorkItemRowLayout {
  item: WorkItem;
  vertical: boolean;
  from: ItemCircleLayout;
  to: ItemCircleLayout;
  /** Arrow shaft, ending where the head begins */
  shaft: { x1: number; y1: number; x2: number; y2: number };
  /** Arrow head triangle, tip first */
  head: [Point, Point, Point];
  label: Point & { text: string; side?: 'start' | 'end' };
}

export interface WorkItemLayout {
  width: number;
  height: number;
  title?: Point & { text: string };
  contentTop: number;
  itemsTop: number;
  columns: ColumnLayout[];
  rows: WorkItemRowLayout[];
}

// ---- Constants ----

export const WORK_ITEM_LAYOUT = {
  margin: 20,
  titleGap: 20,
  columnHeight: 40,
  headerGap: 20,
  itemHeight: 50,
  circleRadius: 15,
  arrowSize: 12,
  labelOffset: 5,
  lineExtension: 15,
  verticalSpacing: 80,
} as const;

// ---- Helpers ----

/**
 * Guide line x positions. One column sits at the canvas center; otherwise the
 * outer columns keep their labels inside the margin and the rest are spread
 * evenly between them.
 */
export function columnPositions(labelWidths: readonly number[], width: number): number[] {
  const count = labelWidths.length;
  if (count === 0) return [];
  if (count === 1) return [width / 2];

  const { margin } = WORK_ITEM_LAYOUT;
  const first = margin + (labelWidths[0] ?? 0) / 2;
  const last = width - margin - (labelWidths[count - 1] ?? 0) / 2;
  const spacing = (last - first) / (count - 1);

  return labelWidths.map((_, index) => (index === count - 1 ? last : first + index * spacing));
}

/**
 * Index of the column named `state`, ignoring case; 0 when none matches.
 */
export function columnIndex(columns: readonly string[], state: string): number {
  const wanted = state.toLowerCase();
  const index = columns.findIndex((column) => column.toLowerCase() === wanted);
  return index === -1 ? 0 : index;
}

export function itemLabel(item: WorkItem): string {
  const change = pointsChange(item);
  if (change === 0) return item.id;
  return `${item.id}: ${change > 0 ? '+' : ''}${change}`;
}

interface RowPlan {
  item: WorkItem;
  y: number;
  fromIndex: number;
  toIndex: number;
  vertical: boolean;
}

/**
 * Row y positions. Both the canvas height and the guide lines are derived
 * from this one plan.
 */
export function planRows(chart: WorkItemMovement, itemsTop: number): RowPlan[] {
  const { itemHeight, verticalSpacing } = WORK_ITEM_LAYOUT;
  const rows: RowPlan[] = [];
  let y = itemsTop;

  for (const item of chart.items) {
    const fromIndex = columnIndex(chart.columns, item.fromState);
    const toIndex = columnIndex(chart.columns, item.toState);
    const vertical = fromIndex === toIndex;
    rows.push({ item, y, fromIndex, toIndex, vertical });
    y += vertical ? verticalSpacing + itemHeight : itemHeight;
  }

  return rows;
}

function lastRowBottom(rows: readonly RowPlan[], itemsTop: number): number {
  const last = rows[rows.length - 1];
  if (!last) return itemsTop;
  return last.y + (last.vertical ? WORK_ITEM_LAYOUT.verticalSpacing : 0);
}

// ---- Layout ----

function layoutVerticalRow(row: RowPlan, x: number, lastColumn: boolean): WorkItemRowLayout {
  const { circleRadius: r, arrowSize, verticalSpacing, labelOffset } = WORK_ITEM_LAYOUT;
  const { item, y } = row;
  const endY = y + verticalSpacing;
  const tipY = endY - r;

  return {
    item,
    vertical: true,
    from: { x, y, points: item.fromPoints },
    to: { x, y: endY, points: item.toPoints },
    shaft: { x1: x, y1: y + r, x2: x, y2: tipY - arrowSize },
    head: [
      { x, y: tipY },
      { x: x - arrowSize / 2, y: tipY - arrowSize },
      { x: x + arrowSize / 2, y: tipY - arrowSize },
    ],
    label: {
      x: lastColumn ? x - labelOffset : x + labelOffset,
      y: (y + endY) / 2,
      text: itemLabel(item),
      side: lastColumn ? 'end' : 'start',
    },
  };
}

function layoutHorizontalRow(row: RowPlan, fromX: number, toX: number): WorkItemRowLayout {
  const { circleRadius: r, arrowSize, labelOffset } = WORK_ITEM_LAYOUT;
  const { item, y } = row;
  // +1 when moving right, -1 when moving left
  const dir = row.fromIndex < row.toIndex ? 1 : -1;
  const tipX = toX - dir * r;

  return {
    item,
    vertical: false,
    from: { x: fromX, y, points: item.fromPoints },
    to: { x: toX, y, points: item.toPoints },
    shaft: { x1: fromX + dir * r, y1: y, x2: tipX - dir * arrowSize, y2: y },
    head: [
      { x: tipX, y },
      { x: tipX - dir * arrowSize, y: y - arrowSize / 2 },
      { x: tipX - dir * arrowSize, y: y + arrowSize / 2 },
    ],
    label: { x: (fromX + toX) / 2, y: y - labelOffset, text: itemLabel(item) },
  };
}

export function layoutWorkItemMovement(chart: WorkItemMovement, ctx: LayoutContext): WorkItemLayout {
  const { width, measurer } = ctx;
  const L = WORK_ITEM_LAYOUT;

  const titleHeight = chart.title !== undefined ? measurer.height(WORK_ITEM_FONT_SIZES.title) : 0;
  const titleGap = chart.title !== undefined ? L.titleGap : 0;

  const labelWidths = chart.columns.map((column) => measurer.width(column, WORK_ITEM_FONT_SIZES.column));
  const positions = columnPositions(labelWidths, width);
  const columnX = (index: number) => positions[index] ?? width / 2;

  const contentTop = L.margin + titleHeight + titleGap;
  const itemsTop = contentTop + L.columnHeight + L.headerGap;

  const plan = planRows(chart, itemsTop);
  const bottom = lastRowBottom(plan, itemsTop);
  const height =
    plan.length === 0
      ? Math.trunc(itemsTop + L.margin)
      : Math.trunc(bottom + L.circleRadius + L.lineExtension + L.margin);

  const columns = chart.columns.map((name, index) => ({
    name,
    x: columnX(index),
    labelY: contentTop + L.columnHeight / 2,
    top: itemsTop - L.circleRadius - L.lineExtension,
    bottom: bottom + L.circleRadius + L.lineExtension,
  }));

  const lastColumn = chart.columns.length - 1;
  const rows = plan.map((row) =>
    row.vertical
      ? layoutVerticalRow(row, columnX(row.fromIndex), row.fromIndex === lastColumn)
      : layoutHorizontalRow(row, columnX(row.fromIndex), columnX(row.toIndex)),
  );

  return {
    width,
    height,
    title:
      chart.title === undefined
        ? undefined
        : { text: chart.title, x: width / 2, y: L.margin + titleHeight / 2 },
    contentTop,
    itemsTop,
    columns,
    rows,
  };
}
