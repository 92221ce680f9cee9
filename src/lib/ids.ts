export type IdGenerator = () => string;

export function createIdGenerator(prefix = "P", start = 0): IdGenerator {
  let next = Math.max(0, Math.floor(start));
  return () => {
    const id = `${prefix}${next}`;
    next += 1;
    return id;
  };
}
