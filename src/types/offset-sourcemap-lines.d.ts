declare module 'offset-sourcemap-lines' {
  function offsetLines(map: object, lineOffset: number): unknown;
  export = offsetLines;
}
