import "reflect-metadata";

export { GlossaryEntry } from "./GlossaryEntry";
export { GlossaryHistory } from "./GlossaryHistory";
export { Like } from "./Like";
