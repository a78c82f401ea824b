const SEGMENT_DELIMITER = /[_\s]+/;

/** `user_id` and `USER_ID` → `UserId`. */
export function camelize(identifier: string): string {
  return identifier
    .toLowerCase()
    .split(SEGMENT_DELIMITER)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

export function lowerCamel(name: string): string {
  return name.charAt(0).toLowerCase() + name.slice(1);
}

export function snakeCase(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase();
}
