import type { Parameters } from "./declaration.js";

export interface AbsentResource {
    readonly exists: false;
}

export interface PresentResource {
    readonly exists: true;
    readonly parameters: Parameters;
}

export type ResourceState = AbsentResource | PresentResource;

export const NOT_FOUND: AbsentResource = { exists: false };
