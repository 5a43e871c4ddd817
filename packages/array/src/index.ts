export { FixedArray, ArrayView, ReadonlyArrayView } from "./ArrayView";
