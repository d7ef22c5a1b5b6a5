export interface LineColumn {
  line: number;
  column: number;
  offset: number;
}

export interface Location {
  start: LineColumn;
  end: LineColumn;
}
