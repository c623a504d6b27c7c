/** @structural */
export type Command = ["run", ...string[]] | ["stop"];
