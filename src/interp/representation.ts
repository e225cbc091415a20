/**
 * Checks that an entity has the representation a backend works with.
 */

import { Backend, RepresentationError } from "../errors";
import type { Arr, LiveArr, SymbolicArr } from "../instructions/arr";
import type { Handle, LiveHandle, SymbolicHandle } from "../instructions/file";
import type { LiveRef, Ref, SymbolicRef } from "../instructions/ref";

export function expectSymbolicRef(ref: Ref, backend: Backend): SymbolicRef {
  if (ref.kind !== "symbolic") throw new RepresentationError("reference", "symbolic", backend);
  return ref;
}

export function expectLiveRef(ref: Ref, backend: Backend): LiveRef {
  if (ref.kind !== "live") throw new RepresentationError("reference", "live", backend);
  return ref;
}

export function expectSymbolicArr(arr: Arr, backend: Backend): SymbolicArr {
  if (arr.kind !== "symbolic") throw new RepresentationError("array", "symbolic", backend);
  return arr;
}

export function expectLiveArr(arr: Arr, backend: Backend): LiveArr {
  if (arr.kind !== "live") throw new RepresentationError("array", "live", backend);
  return arr;
}

export function expectSymbolicHandle(handle: Handle, backend: Backend): SymbolicHandle {
  if (handle.kind !== "symbolic") throw new RepresentationError("handle", "symbolic", backend);
  return handle;
}

export function expectLiveHandle(handle: Handle, backend: Backend): LiveHandle {
  if (handle.kind !== "live") throw new RepresentationError("handle", "live", backend);
  return handle;
}
