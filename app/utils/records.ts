export const hasOwnKey = (record: object, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(record, key)
