// Transit line metadata as attached to a trajectory feature

export interface Line {
  readonly color: string;
  readonly id: number;
  readonly name: string;
  readonly stroke: string;
  readonly textColor: string;
}

/** Canonical identity of a line: two lines are equal when every field is. */
export function lineKey(line: Line): string {
  return JSON.stringify([line.color, line.id, line.name, line.stroke, line.textColor]);
}
