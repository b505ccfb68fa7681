import type { Bar, BarGroup, Barline, Element, Position, Rational } from '../types';
import { multiply } from '../utils';

/**
 * Raised when a group would reference an element outside its own bar.
 * Groups (beams, slurs, tuplets) never span a bar line.
 */
export class BarInvariantError extends Error {
  constructor(
    message: string,
    public readonly group: BarGroup,
    public readonly barSize: number
  ) {
    super(message);
    this.name = 'BarInvariantError';
  }
}

const GROUP_ORDER: Record<BarGroup['kind'], number> = { beam: 0, slur: 1, tuplet: 2 };

function compareGroups(a: BarGroup, b: BarGroup): number {
  return a.start - b.start || b.end - a.end || GROUP_ORDER[a.kind] - GROUP_ORDER[b.kind];
}

function checkGroup(group: BarGroup, size: number): void {
  const inside = Number.isInteger(group.start) && Number.isInteger(group.end)
    && group.start >= 0 && group.start <= group.end && group.end < size;
  if (!inside) {
    throw new BarInvariantError(
      `${group.kind} group ${group.start}..${group.end} does not fit in a bar of ${size} elements`,
      group,
      size
    );
  }
}

/**
 * Accumulates the contents of one bar. Groups are checked against the
 * elements added so far, so a group can only ever point inside this bar.
 */
export class BarBuilder {
  private readonly elements: Element[] = [];
  private readonly groups: BarGroup[] = [];
  ending?: number;
  endingLabel?: string;

  constructor(private readonly start: Position) {}

  get size(): number {
    return this.elements.length;
  }

  isEmpty(): boolean {
    return this.elements.length === 0 && this.ending === undefined;
  }

  at(index: number): Element | undefined {
    return this.elements[index];
  }

  add(element: Element): number {
    this.elements.push(element);
    return this.elements.length - 1;
  }

  /** Multiply the duration of a timed element in place. */
  scale(index: number, factor: Rational): void {
    const element = this.elements[index];
    if (element && element.kind !== 'unmodeled') {
      element.duration = multiply(element.duration, factor);
    }
  }

  addGroup(group: BarGroup): void {
    checkGroup(group, this.elements.length);
    this.groups.push(group);
  }

  build(end: Position, barline?: Barline): Bar {
    const bar: Bar = {
      elements: this.elements,
      groups: [...this.groups].sort(compareGroups),
      span: { start: this.start, end },
    };
    if (barline) bar.barline = barline;
    if (this.ending !== undefined) bar.ending = this.ending;
    if (this.endingLabel !== undefined) bar.endingLabel = this.endingLabel;
    return bar;
  }
}

/**
 * Build a bar from ready-made parts, applying the same group checks as the
 * parser does. For callers assembling tunes by hand.
 */
export function createBar(
  elements: Element[],
  groups: BarGroup[] = [],
  options: { barline?: Barline; ending?: number; endingLabel?: string; lineEnd?: boolean; span?: Bar['span'] } = {}
): Bar {
  for (const group of groups) {
    checkGroup(group, elements.length);
  }
  const origin: Position = { offset: 0, line: 1, column: 1 };
  const bar: Bar = {
    elements: [...elements],
    groups: [...groups].sort(compareGroups),
    span: options.span ?? { start: origin, end: origin },
  };
  if (options.barline) bar.barline = options.barline;
  if (options.ending !== undefined) bar.ending = options.ending;
  if (options.endingLabel !== undefined) bar.endingLabel = options.endingLabel;
  if (options.lineEnd) bar.lineEnd = true;
  return bar;
}
