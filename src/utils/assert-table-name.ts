const TABLE_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function assertTableName(tableName: string): string {
  if (!TABLE_NAME_REGEX.test(tableName)) {
    throw new Error(
      `Invalid table name "${tableName}". Only alphanumeric characters and underscores are allowed.`,
    );
  }
  return tableName;
}
