/**
 * Test-only helpers for poking at record strings.
 * Plain split on purpose: tests must not depend on the parser they are testing.
 */

export function splitRecord(record: string): string[] {
  return record.split('$');
}

export function joinRecord(fields: string[]): string {
  return fields.join('$');
}

export function withField(record: string, index: number, value: string): string {
  const fields = splitRecord(record);
  fields[index] = value;
  return joinRecord(fields);
}

export function fieldAt(record: string, index: number): string {
  const value = splitRecord(record)[index];
  if (value === undefined) throw new Error(`record has no field ${index}`);
  return value;
}
