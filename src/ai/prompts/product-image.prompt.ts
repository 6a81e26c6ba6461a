export const PRODUCT_IMAGE_PROMPT = `High-quality advertising product photo for the brand {{brand_name}}.
Product name: {{product_name}}.
Product description: {{product_description}}.
Target demographic: {{demographics}}.
{{keywords}}
Style: clean, modern commercial photography, well-lit, realistic, studio-quality composition suitable for digital marketing creatives.
Keep the product centered with generous margins; leave the lower third uncluttered for overlaid copy.
Do NOT render any text, logos or watermarks.`;

export const DEFAULT_DEMOGRAPHIC = 'General active lifestyle audience';
