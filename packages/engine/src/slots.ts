/**
 * Slot layout of the fountain cabinet: six rows of eight lanes numbered
 * 1-8, 11-18, ... 51-58. Row r, column c is slot (r - 1) * 10 + c.
 */

export const ROW_COUNT = 6;
export const COLUMN_COUNT = 8;

export interface SlotPosition {
	/** 1-based row */
	row: number;
	/** 1-based column */
	column: number;
}

/** Every valid slot, row by row */
export const VALID_SLOTS: readonly number[] = Object.freeze(
	Array.from({ length: ROW_COUNT * COLUMN_COUNT }, (_, i) => {
		const row = Math.floor(i / COLUMN_COUNT);
		const column = i % COLUMN_COUNT;
		return row * 10 + column + 1;
	}),
);

const VALID_SLOT_SET: ReadonlySet<number> = new Set(VALID_SLOTS);

export function isValidSlot(slot: number): boolean {
	return VALID_SLOT_SET.has(slot);
}

/** @returns 1-based row, or undefined for a slot outside the layout */
export function rowOf(slot: number): number | undefined {
	return isValidSlot(slot) ? Math.floor(slot / 10) + 1 : undefined;
}

/** @returns 1-based column, or undefined for a slot outside the layout */
export function columnOf(slot: number): number | undefined {
	return isValidSlot(slot) ? slot % 10 : undefined;
}

export function slotPosition(slot: number): SlotPosition | undefined {
	const row = rowOf(slot);
	const column = columnOf(slot);
	if (row === undefined || column === undefined) {
		return undefined;
	}
	return { row, column };
}

/** @returns The eight slots of a row, or an empty list for rows outside 1-6 */
export function slotsInRow(row: number): number[] {
	if (!Number.isInteger(row) || row < 1 || row > ROW_COUNT) {
		return [];
	}
	return VALID_SLOTS.slice((row - 1) * COLUMN_COUNT, row * COLUMN_COUNT);
}

/** Slot at a row and column, or undefined outside the layout */
export function slotAt(row: number, column: number): number | undefined {
	if (!Number.isInteger(column) || column < 1 || column > COLUMN_COUNT) {
		return undefined;
	}
	const slot = (row - 1) * 10 + column;
	return isValidSlot(slot) ? slot : undefined;
}
