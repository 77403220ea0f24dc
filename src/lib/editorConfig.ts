/**
 * Interaction thresholds for the plan editor.
 *
 * Distances are in scene units (image pixels) unless the name says `PX`, which
 * means screen pixels and is converted through the current zoom. These were tuned
 * by hand against mouse input on a desktop display.
 */

/** Hold time before a press on empty space turns into a circle drag-create. */
export const PRESS_HOLD_MS = 500;
/** Idle time that closes a coalesced edit session (wheel scaling, anchor drags, panel typing). */
export const EDIT_END_DEBOUNCE_MS = 300;
/** Interval at which the host polls pending deadlines. */
export const TICK_INTERVAL_MS = 16;

export const MIN_MEMO_LINE_LENGTH = 8;
export const MIN_MEMO_PATH_SIZE = 6;
/** Added to the mark's larger side to get the minimum drag-create distance. */
export const CREATE_DRAG_MARGIN = 10;

export const ANCHOR_HANDLE_RADIUS_PX = 10;

export const CIRCLE_MIN_SCALE = 0.6;
export const CIRCLE_MAX_SCALE = 2.5;

export const WHEEL_SCALE_STEP = 1.1;
export const WHEEL_ZOOM_STEP = 1.15;
export const WHEEL_PAN_FACTOR = 0.5;

/** Half-width of the hit area around memo strokes and the S-curve stroke. */
export const STROKE_HIT_TOLERANCE = 5;

export const LABEL_MARGIN_X = 6;
export const LABEL_MARGIN_Y = 2;
export const LABEL_FONT_SIZE = 14;
export const ID_FONT_SIZE = 10;
export const NOTE_FONT_SIZE = 12;

export const DEFAULT_MEMBER = 'Wall';
export const DEFAULT_NOTE_TEXT = 'Defect';
