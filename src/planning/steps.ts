// src/planning/steps.ts
//
// Spacing between neighbouring captures for a given footprint and overlap.
//

import type { Footprint, StepSizes } from "@/domain/types";
import { assertOverlap } from "@/domain/inputs";

/**
 * stepEast = groundWidth · (1 − overlap), stepNorth = groundHeight · (1 − overlap).
 * An overlap of 0 tiles footprints edge to edge; 1 or more would never advance.
 */
export function planStepSizes(footprint: Footprint, overlapFraction: number): StepSizes {
  assertOverlap(overlapFraction);
  const keep = 1 - overlapFraction;
  return Object.freeze({
    stepEast: footprint.groundWidth * keep,
    stepNorth: footprint.groundHeight * keep,
  });
}
