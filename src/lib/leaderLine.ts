import type { Point } from './geometry';
import { rayIntersectionPoint } from './geometry';
import type { LeaderOwner } from './marks';
import { sceneBoundsCenter, sceneOutline } from './marks';

const PREVIEW_OPACITY = 0.4;

/**
 * Leader lines live in scene space and are drawn beneath every mark. The anchor is
 * fixed where the user put it; only the terminus follows the owner around.
 */

export function beginAttach(mark: LeaderOwner, anchor: Point): void {
  mark.leader = { anchor: { ...anchor }, p1: { ...anchor }, p2: { ...anchor }, opacity: PREVIEW_OPACITY };
}

/** Straight to the pointer while dragging; no outline intersection. */
export function updateAttachPreview(mark: LeaderOwner, target: Point): void {
  if (!mark.leader) return;
  mark.leader.p1 = { ...mark.leader.anchor };
  mark.leader.p2 = { ...target };
}

/** Terminus where the anchor→centre ray crosses the outline, or the centre when it misses. */
export function leaderTerminus(mark: LeaderOwner, anchor: Point): Point {
  const hit = rayIntersectionPoint(sceneOutline(mark), anchor, mark.pos, sceneBoundsCenter(mark));
  return hit ?? { ...mark.pos };
}

export function recomputeLeaderGeometry(mark: LeaderOwner): void {
  const line = mark.leader;
  if (!line) return;
  line.p1 = { ...line.anchor };
  line.p2 = leaderTerminus(mark, line.anchor);
}

export function confirmAttach(mark: LeaderOwner): void {
  if (!mark.leader) return;
  recomputeLeaderGeometry(mark);
  mark.leader.opacity = 1;
}

export function cancelAttach(mark: LeaderOwner): void {
  mark.leader = null;
}

/** Only path that moves an anchor besides restoring a record. */
export function moveAnchor(mark: LeaderOwner, anchor: Point): void {
  if (!mark.leader) return;
  mark.leader.anchor = { ...anchor };
  recomputeLeaderGeometry(mark);
}

/** Reattach a persisted line: `p1` becomes the anchor and the terminus is recomputed. */
export function restoreAttach(mark: LeaderOwner, p1: Point): void {
  mark.leader = { anchor: { ...p1 }, p1: { ...p1 }, p2: { ...p1 }, opacity: 1 };
  recomputeLeaderGeometry(mark);
}
