import { isRecord } from "./records.js";

export function getByPath(obj: unknown, dottedPath: string): unknown {
  if (!dottedPath) {
    return obj;
  }
  return dottedPath.split(".").reduce<unknown>((acc, part) => {
    if (!isRecord(acc)) {
      return undefined;
    }
    return acc[part];
  }, obj);
}
