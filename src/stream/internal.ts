export const _read = Symbol("read");
export const _release = Symbol("release");
export const _cancel = Symbol("cancel");
