/********* BASIC TYPES *********/
export type Address = string;
export type HexString = string;
export type Numberish = number | string | bigint;
