import {
  AcquisitionMarkerPolicyName,
  CtDosePatternLibrary,
} from '../domain/patterns/pattern-library';

export interface AcquisitionMarker {
  readonly start: number;
  readonly end: number;
  readonly heading: string;
}

export interface AcquisitionBlock {
  readonly index: number;
  readonly heading: string;
  readonly text: string;
}

/**
 * Splits a normalized report into one block per acquisition marker.
 *
 * Every enabled policy is matched over the whole text; matches whose ranges
 * overlap are the same heading seen twice and count as one marker. Text
 * before the first marker belongs to no acquisition.
 */
export class AcquisitionSegmenter {
  private readonly markerPatterns: readonly RegExp[];

  constructor(markerPatterns: readonly RegExp[]) {
    if (markerPatterns.length === 0) {
      throw new Error('At least one acquisition marker pattern is required');
    }
    this.markerPatterns = markerPatterns;
  }

  static fromPolicies(
    library: CtDosePatternLibrary,
    policies: readonly AcquisitionMarkerPolicyName[],
  ): AcquisitionSegmenter {
    return new AcquisitionSegmenter(
      policies.map((policy) => library.acquisitionMarkers[policy]),
    );
  }

  detectMarkers(text: string): AcquisitionMarker[] {
    const ranges: Array<{ start: number; end: number }> = [];
    for (const pattern of this.markerPatterns) {
      // Fresh global copy per call; the shared pattern is never stateful
      const globalPattern = new RegExp(pattern.source, `${pattern.flags}g`);
      for (const match of text.matchAll(globalPattern)) {
        if (match.index === undefined || match[0].length === 0) {
          continue;
        }
        ranges.push({ start: match.index, end: match.index + match[0].length });
      }
    }

    ranges.sort((a, b) => a.start - b.start || b.end - a.end);

    const merged: Array<{ start: number; end: number }> = [];
    for (const range of ranges) {
      const last = merged.length > 0 ? merged[merged.length - 1] : undefined;
      if (last && range.start < last.end) {
        last.end = Math.max(last.end, range.end);
        continue;
      }
      merged.push({ ...range });
    }

    return merged.map(({ start, end }) => ({
      start,
      end,
      heading: text.slice(start, end).replace(/\s+/g, ' '),
    }));
  }

  segment(text: string): AcquisitionBlock[] {
    const markers = this.detectMarkers(text);
    return markers.map((marker, index) => {
      const next = markers[index + 1];
      return {
        index,
        heading: marker.heading,
        text: text.slice(marker.start, next ? next.start : text.length),
      };
    });
  }
}
