function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Turns a directory-style name into a constant name, the way Rails does:
 * `shipping_rates` -> `ShippingRates`, `admin/tools` -> `Admin::Tools`.
 * Names that are already camelized are left alone.
 */
export function camelize(term: string): string {
  const head = term.replace(/^[a-z\d]*/, m => capitalize(m));
  const joined = head.replace(
    /(?:_|(\/))([a-z\d]*)/gi,
    (_match: string, slash: string | undefined, word: string) => `${slash ?? ''}${capitalize(word)}`,
  );
  return joined.replace(/\//g, '::');
}

export function underscore(constantName: string): string {
  return constantName
    .replace(/::/g, '/')
    .replace(/([A-Z\d]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .replace(/-/g, '_')
    .toLowerCase();
}

export function removeLeadingColons(name: string): string {
  return name.replace(/^:*/, '');
}
