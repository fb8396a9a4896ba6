import type { AllocationGroupBy, GroupByMode } from "@perfscope/contracts";

const PSEUDO_FRAME_PREFIXES = ["Thread (", "Process", "UNMANAGED_CODE_TIME", "CPU_TIME", "LAST_BLOCK"];
const BROKEN_STACK_MARKERS = new Set(["BROKEN", "?!?"]);

export const RUNTIME_GROUP = "[Runtime]";
export const NATIVE_UNKNOWN_GROUP = "[Native/Unknown]";
export const UNKNOWN_GROUP = "[Unknown]";

/**
 * Thread/process boundaries, broken-stack markers and unmanaged or CPU-time
 * accounting frames. Anything else, however odd, is treated as a real frame.
 */
export function isPseudoFrame(name: string | null | undefined): boolean {
  if (!name) return true;
  if (BROKEN_STACK_MARKERS.has(name)) return true;
  return PSEUDO_FRAME_PREFIXES.some((prefix) => name.startsWith(prefix));
}

function isBoundaryFrame(name: string): boolean {
  return name.startsWith("Thread (") || name.startsWith("Process");
}

export function moduleOfFrame(frameName: string): string {
  if (!frameName) return UNKNOWN_GROUP;
  if (isBoundaryFrame(frameName)) return RUNTIME_GROUP;
  if (frameName === "?!?") return NATIVE_UNKNOWN_GROUP;
  const bangIndex = frameName.indexOf("!");
  return bangIndex > 0 ? frameName.slice(0, bangIndex) : UNKNOWN_GROUP;
}

export function namespaceOfFrame(frameName: string): string {
  if (!frameName) return UNKNOWN_GROUP;
  if (isBoundaryFrame(frameName)) return RUNTIME_GROUP;
  if (frameName === "?!?") return NATIVE_UNKNOWN_GROUP;
  const bangIndex = frameName.indexOf("!");
  if (bangIndex < 0) return UNKNOWN_GROUP;
  let fullName = frameName.slice(bangIndex + 1);
  const parenIndex = fullName.indexOf("(");
  if (parenIndex > 0) fullName = fullName.slice(0, parenIndex);
  const parts = fullName.split(".");
  if (parts.length <= 2) return parts[0] ?? UNKNOWN_GROUP;
  return parts.slice(0, parts.length - 2).join(".");
}

export function groupKey(frameName: string, mode: GroupByMode): string {
  switch (mode) {
    case "module":
      return moduleOfFrame(frameName);
    case "namespace":
      return namespaceOfFrame(frameName);
    default:
      return frameName;
  }
}

export function typeGroupKey(typeName: string, mode: AllocationGroupBy): string {
  if (mode === "namespace") {
    let name = typeName;
    const arityIndex = name.indexOf("`");
    if (arityIndex > 0) name = name.slice(0, arityIndex);
    const bracketIndex = name.indexOf("[");
    if (bracketIndex > 0) name = name.slice(0, bracketIndex);
    const lastDot = name.lastIndexOf(".");
    return lastDot > 0 ? name.slice(0, lastDot) : name;
  }
  if (mode === "module") {
    const firstDot = typeName.indexOf(".");
    return firstDot > 0 ? typeName.slice(0, firstDot) : typeName;
  }
  return typeName;
}

export function parseGroupByMode(value: string | undefined): GroupByMode {
  const normalized = (value ?? "").trim().toLowerCase();
  if (normalized === "module" || normalized === "namespace") return normalized;
  return "method";
}

export function parseAllocationGroupBy(value: string | undefined): AllocationGroupBy {
  const normalized = (value ?? "").trim().toLowerCase();
  if (normalized === "module" || normalized === "namespace") return normalized;
  return "type";
}
