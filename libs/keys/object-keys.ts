/** Objects directly at the bucket root carry no "/" in their key. */
export function isRootLevel(key: string): boolean {
    return key !== "" && !key.includes("/");
}

/**
 * The identifier is the token before the first separator, e.g. `sr1` for
 * `sr1_cust_01.csv`. Keys without a separator or with an empty leading token
 * have none.
 */
export function extractIdentifier(key: string, separator = "_"): string | undefined {
    const at = key.indexOf(separator);
    if (at <= 0) return undefined;
    return key.slice(0, at);
}

/** `prefixDir` must be slash terminated. */
export function destinationKey(prefixDir: string, identifier: string, key: string): string {
    return `${prefixDir}${identifier}/${key}`;
}
