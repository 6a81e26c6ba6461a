/**
 * Lowercase, collapse every non-alphanumeric run to a single "-",
 * trim dashes. Empty input yields "item".
 */
export function slugify(text: string): string {
	const slug = text
		.toLowerCase()
		.replace(/[^a-z0-9]+/g, '-')
		.replace(/^-+|-+$/g, '');
	return slug || 'item';
}
