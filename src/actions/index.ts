export { proposeChange, buildInstruction, resolveTargetFile } from "./proposeChange";
export { approveChange } from "./approveChange";
export { rejectChange } from "./rejectChange";
export { revertChange } from "./revertChange";
export type { ActionContext, ActionOutcome } from "./types";
