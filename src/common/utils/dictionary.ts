export interface Dictionary<T> {
  [key: string]: T;
}

export const deepFreeze = <T>(value: T): T => {
  if (value instanceof Object && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};
