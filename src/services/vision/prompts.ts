export const FOOD_ANALYSIS_PROMPT = `
Identify the main food item in this image.

Put the food's common name alone on the very first line, with no other text.
Then give:
- its usual ingredients, as a list (for a raw single ingredient, just the item);
- approximate macros per 100 g: calories, protein, carbohydrates, fat, fibre;
- an estimate of how fresh it looks and what that estimate is based on.

For packaged food whose ingredients cannot be seen, say so and give typical values.
If the image shows no recognisable food, write "Not food" on the first line and explain briefly.
`.trim();
