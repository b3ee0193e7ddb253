import chalk from 'chalk';

export type OutputFormat = 'human' | 'json' | 'xml' | 'csv';

export interface Formatter {
	format(data: unknown): string;
	formatError(error: Error | { message: string }): string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatScalar(value: unknown): string {
	if (value === null || value === undefined) {
		return '';
	}
	if (typeof value === 'object') {
		return JSON.stringify(value);
	}
	return String(value);
}

export class HumanFormatter implements Formatter {
	format(data: unknown): string {
		if (Array.isArray(data)) {
			return data.map((item) => this.formatItem(item)).join('\n\n');
		}
		return this.formatItem(data);
	}

	private formatHealth(obj: Record<string, unknown>): string {
		const status = obj.healthy === true ? chalk.green('✓') : chalk.red('✗');
		const lines = [`${status} ${chalk.bold(formatScalar(obj.provider))} ${formatScalar(obj.message)}`];

		if (obj.model) {
			lines.push(`  Model: ${formatScalar(obj.model)}`);
		}
		if (obj.endpoint) {
			lines.push(`  Endpoint: ${formatScalar(obj.endpoint)}`);
		}

		return lines.join('\n');
	}

	private formatErrors(errors: unknown[]): string[] {
		const lines = ['', chalk.yellow(`${errors.length} problem(s):`)];
		for (const error of errors) {
			lines.push(chalk.red(`  ${formatScalar(error)}`));
		}
		return lines;
	}

	private formatSection(title: string, obj: Record<string, unknown>): string {
		const lines: string[] = [chalk.bold(title)];

		for (const [key, value] of Object.entries(obj)) {
			if (value === undefined) continue;
			if (key === 'errors' && Array.isArray(value)) {
				if (value.length > 0) {
					lines.push(...this.formatErrors(value));
				}
				continue;
			}
			if (isRecord(value)) {
				const entries = Object.entries(value)
					.map(([k, v]) => `${k}=${formatScalar(v)}`)
					.join(', ');
				lines.push(`  ${key}: ${entries || chalk.dim('none')}`);
				continue;
			}
			lines.push(`  ${key}: ${formatScalar(value)}`);
		}

		return lines.join('\n');
	}

	private formatObject(obj: Record<string, unknown>): string {
		if ('healthy' in obj && 'provider' in obj) {
			return this.formatHealth(obj);
		}

		const category = obj.category;
		if (typeof category === 'string') {
			const { category: _category, provider, ...rest } = obj;
			const title = typeof provider === 'string' ? `${category} (${provider})` : category;
			return this.formatSection(title, rest);
		}

		const provider = obj.provider;
		if (typeof provider === 'string') {
			const { provider: _provider, ...rest } = obj;
			return this.formatSection(provider, rest);
		}

		return Object.entries(obj)
			.filter(([, value]) => value !== undefined)
			.map(([key, value]) => {
				if (Array.isArray(value) && value.every(isRecord)) {
					return `${chalk.bold(key)}:\n${value.map((item) => this.formatItem(item)).join('\n')}`;
				}
				return `${chalk.bold(key)}: ${formatScalar(value)}`;
			})
			.join('\n');
	}

	private formatItem(item: unknown): string {
		if (item === null || item === undefined) {
			return '';
		}

		if (typeof item === 'string') {
			return item;
		}

		if (isRecord(item)) {
			return this.formatObject(item);
		}

		return formatScalar(item);
	}

	formatError(error: Error | { message: string }): string {
		return chalk.red(`Error: ${error.message}`);
	}
}

export class JsonFormatter implements Formatter {
	format(data: unknown): string {
		return JSON.stringify(data, null, 2);
	}

	formatError(error: Error | { message: string }): string {
		return JSON.stringify({ error: error.message }, null, 2);
	}
}

export class XmlFormatter implements Formatter {
	format(data: unknown): string {
		return this.toXml(data, 'result', 0);
	}

	private toXml(data: unknown, rootName: string, depth: number): string {
		const indent = '  '.repeat(depth);
		const childIndent = '  '.repeat(depth + 1);

		if (data === null || data === undefined) {
			return `${indent}<${rootName}/>`;
		}

		if (Array.isArray(data)) {
			if (data.length === 0) {
				return `${indent}<${rootName}/>`;
			}
			const items = data.map((item) => this.toXml(item, 'item', depth + 1)).join('\n');
			return `${indent}<${rootName}>\n${items}\n${indent}</${rootName}>`;
		}

		if (isRecord(data)) {
			const children = Object.entries(data)
				.filter(([, value]) => value !== undefined && value !== null)
				.map(([key, value]) => {
					if (Array.isArray(value) || isRecord(value)) {
						return this.toXml(value, key, depth + 1);
					}
					return `${childIndent}<${key}>${this.escapeXml(String(value))}</${key}>`;
				})
				.join('\n');
			return `${indent}<${rootName}>\n${children}\n${indent}</${rootName}>`;
		}

		return `${indent}<${rootName}>${this.escapeXml(String(data))}</${rootName}>`;
	}

	private escapeXml(str: string): string {
		return str
			.replace(/&/g, '&amp;')
			.replace(/</g, '&lt;')
			.replace(/>/g, '&gt;')
			.replace(/"/g, '&quot;')
			.replace(/'/g, '&apos;');
	}

	formatError(error: Error | { message: string }): string {
		return `<error>${this.escapeXml(error.message)}</error>`;
	}
}

/**
 * Flatten nested objects and arrays into dotted keys
 * (`answers.0`, `translation.context`). Empty containers become empty cells.
 */
export function flattenRecord(value: unknown, prefix = ''): Record<string, string> {
	const flat: Record<string, string> = {};

	const visit = (current: unknown, key: string) => {
		if (Array.isArray(current)) {
			if (current.length === 0 && key) flat[key] = '';
			current.forEach((item, i) => visit(item, key ? `${key}.${i}` : String(i)));
			return;
		}
		if (isRecord(current)) {
			const entries = Object.entries(current);
			if (entries.length === 0 && key) flat[key] = '';
			for (const [childKey, childValue] of entries) {
				visit(childValue, key ? `${key}.${childKey}` : childKey);
			}
			return;
		}
		flat[key || 'value'] = formatScalar(current);
	};

	visit(value, prefix);
	return flat;
}

export class CsvFormatter implements Formatter {
	format(data: unknown): string {
		const rows = (Array.isArray(data) ? data : [data]).map((row) => flattenRecord(row));

		const columns: string[] = [];
		for (const row of rows) {
			for (const key of Object.keys(row)) {
				if (!columns.includes(key)) {
					columns.push(key);
				}
			}
		}

		const lines = [columns.map((c) => this.escapeCsv(c)).join(',')];
		for (const row of rows) {
			lines.push(columns.map((c) => this.escapeCsv(row[c] ?? '')).join(','));
		}
		return lines.join('\n');
	}

	private escapeCsv(field: string): string {
		if (/[",\r\n]/.test(field)) {
			return `"${field.replace(/"/g, '""')}"`;
		}
		return field;
	}

	formatError(error: Error | { message: string }): string {
		return `error\n${this.escapeCsv(error.message)}`;
	}
}

export function getFormatter(format: OutputFormat): Formatter {
	switch (format) {
		case 'json':
			return new JsonFormatter();
		case 'xml':
			return new XmlFormatter();
		case 'csv':
			return new CsvFormatter();
		default:
			return new HumanFormatter();
	}
}
