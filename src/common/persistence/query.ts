/**
 * Helpers for building MongoDB query conditions
 */

export const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Case-insensitive whole-value match
 */
export const equalsIgnoreCase = (value: string): { $regex: string; $options: string } => ({
  $regex: `^${escapeRegex(value)}$`,
  $options: 'i',
});

/**
 * Case-insensitive substring match
 */
export const containsIgnoreCase = (value: string): { $regex: string; $options: string } => ({
  $regex: escapeRegex(value),
  $options: 'i',
});

/**
 * Inclusive range; undefined when neither bound is given
 */
export const inRange = <V extends number | Date>(
  from?: V,
  to?: V
): { $gte?: V; $lte?: V } | undefined => {
  if (from === undefined && to === undefined) return undefined;
  const condition: { $gte?: V; $lte?: V } = {};
  if (from !== undefined) condition.$gte = from;
  if (to !== undefined) condition.$lte = to;
  return condition;
};
