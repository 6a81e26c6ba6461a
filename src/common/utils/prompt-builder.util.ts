export type PromptVariable = string | number | boolean | string[] | Record<string, unknown> | undefined;

export class PromptBuilder {
	/**
	 * Fill `{{key}}` markers. String arrays join with ", ", other objects are
	 * JSON-stringified, undefined becomes an empty string.
	 */
	static build(template: string, variables: Record<string, PromptVariable>): string {
		let prompt = template;

		Object.keys(variables).forEach(key => {
			const value = variables[key];
			const regex = new RegExp(`{{${key}}}`, 'g');
			prompt = prompt.replace(regex, () => PromptBuilder.stringify(value));
		});

		return prompt.trim();
	}

	private static stringify(value: PromptVariable): string {
		if (value === undefined) return '';
		if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
			return String(value);
		}
		if (Array.isArray(value)) {
			return value.join(', ');
		}
		return JSON.stringify(value);
	}
}
