export const RUNTIME_MODULE_PATH = '\0chunklink:runtime';

export const RUNTIME_HELPERS = ['__esm', '__commonJS', '__export', '__toESM', '__toCommonJS'] as const;

export type RuntimeHelper = (typeof RUNTIME_HELPERS)[number];

/**
 * Interop helpers, bundled as an ES module the first time a chunk needs one.
 * - __esm: lazy initializer of a wrapped ES module
 * - __commonJS: lazy `require_x()` of a wrapped CommonJS module
 * - __export: defines live getters on a namespace object
 * - __toESM: module object with a `default` for a CommonJS value
 * - __toCommonJS: exports object of an ES module namespace
 */
export function bundleRuntime(): string {
  return `var __defProp = Object.defineProperty;
var __getOwnPropNames = Object.getOwnPropertyNames;
var __hasOwnProp = Object.prototype.hasOwnProperty;
var __copyProps = (to, from) => {
  if (from && (typeof from === "object" || typeof from === "function")) {
    for (let key of __getOwnPropNames(from)) {
      if (!__hasOwnProp.call(to, key)) __defProp(to, key, { get: () => from[key], enumerable: true });
    }
  }
  return to;
};
export var __esm = (fn, res) => () => (fn && (res = fn((fn = 0))), res);
export var __commonJS = (cb, mod) => () => (mod || cb((mod = { exports: {} }).exports, mod), mod.exports);
export var __export = (target, all) => {
  for (var name in all) __defProp(target, name, { get: all[name], enumerable: true });
};
export var __toESM = (mod) => (mod && mod.__esModule ? mod : __copyProps(__defProp({}, "default", { value: mod, enumerable: true }), mod));
export var __toCommonJS = (mod) => __copyProps(__defProp({}, "__esModule", { value: true }), mod);
`;
}
