// Drops keys whose value is undefined so a partial update never touches
// columns the caller left out.
export const definedOnly = <T extends object>(patch: T): Partial<T> => {
  const result: Partial<T> = { ...patch };
  for (const key in result) {
    if (result[key] === undefined) {
      delete result[key];
    }
  }
  return result;
};

export const hasChanges = (patch: object): boolean => Object.keys(patch).length > 0;

export const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (match) => `\\${match}`);
