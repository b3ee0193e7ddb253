export { buildPrompt, buildPrompts, promptId } from './assembler.js';
export {
	BUILTIN_TEMPLATES,
	PLACEHOLDERS,
	type Placeholder,
	type PromptTemplate,
	type TemplateFrontmatter,
	findPlaceholders,
	loadTemplate,
	loadTemplateFile,
	parseTemplate,
	renderTemplate,
} from './template.js';
