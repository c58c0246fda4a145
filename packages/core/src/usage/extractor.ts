import { load, type CheerioAPI, type Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { MarkupStructureError } from '../errors.js';
import { parseFigure, sanitizeText } from '../utils.js';
import { UsageSnapshot, type UsageFiguresInput } from './snapshot.js';

export interface ExtractorOptions {
	/** Label preceding the `<used> / <total>` included-request figure */
	includedLabel: string;
	/** Label preceding the `$<used> / $<limit>` on-demand figure */
	onDemandLabel: string;
	/** Tried in order; the first selector with a data row wins */
	rowSelectors: string[];
	/** Zero-based cell positions within an activity row */
	timestampCell: number;
	modelCell: number;
}

export const DEFAULT_EXTRACTOR_OPTIONS: ExtractorOptions = {
	includedLabel: 'Included-Request Usage',
	onDemandLabel: 'On-Demand Usage',
	rowSelectors: ['[role="row"].dashboard-table-row', 'table tbody tr'],
	timestampCell: 0,
	modelCell: 3,
};

const NON_CONTENT = 'script, style, noscript, template';
const HEADER_CELLS = 'th, [role="columnheader"]';
const DATA_CELLS = '[role="cell"], td';
const MACHINE_ATTRIBUTES = ['datetime', 'title'] as const;

const FIGURE = String.raw`(\d[\d,]*(?:\.\d+)?)`;
const COUNT = String.raw`(\d[\d,]*)`;

/**
 * Parses the usage dashboard markup into a snapshot.
 *
 * Each figure is looked up independently; a missing section leaves its
 * fields at their defaults. Only a document with an empty body throws.
 */
export function extractUsage(
	markup: string,
	options: Partial<ExtractorOptions> = {},
): UsageSnapshot {
	const opts: ExtractorOptions = { ...DEFAULT_EXTRACTOR_OPTIONS, ...options };
	const $ = load(markup);

	$(NON_CONTENT).remove();
	const body = $('body');
	if (body.children().length === 0 && sanitizeText(body.text()) === '') {
		throw new MarkupStructureError('Dashboard markup has no page content');
	}

	separateElements($, body);
	const text = sanitizeText(body.text());
	const labels = [opts.includedLabel, opts.onDemandLabel];

	const figures: UsageFiguresInput = {};

	const included = matchInSection(
		text,
		opts.includedLabel,
		labels,
		new RegExp(String.raw`${COUNT}\s*/\s*${COUNT}`),
	);
	if (included) {
		figures.includedUsed = parseFigure(included[1]);
		figures.includedTotal = parseFigure(included[2]);
	}

	const onDemand = matchInSection(
		text,
		opts.onDemandLabel,
		labels,
		new RegExp(String.raw`\$\s*${FIGURE}\s*/\s*\$\s*${FIGURE}`),
	);
	if (onDemand) {
		figures.onDemandUsed = parseFigure(onDemand[1]);
		figures.onDemandLimit = parseFigure(onDemand[2]);
	}

	const row = findLatestRow($, opts.rowSelectors);
	if (row) {
		const cells = row.find(DATA_CELLS);
		const model = readCell(cells, opts.modelCell);

		figures.lastRequestTimestamp = readCell(cells, opts.timestampCell);
		figures.lastModelName = model;
		figures.isThinkingMode = model !== undefined && model.toLowerCase().includes('thinking');
		figures.isMaxMode = /\bmax\b/i.test(sanitizeText(row.text()));
	}

	return UsageSnapshot.create(figures);
}

/**
 * Pads every element with whitespace so text from sibling or nested elements
 * never runs together (`<b>12</b><b>3</b>` reads as `12 3`, not `123`).
 */
function separateElements($: CheerioAPI, root: Cheerio<Element>): void {
	root.find('*').each((_, el) => {
		$(el).prepend(' ').append(' ');
	});
}

/**
 * Matches `label` however the page splits it across elements: any run of
 * whitespace between words, and around hyphens.
 */
function labelPattern(label: string): RegExp {
	const words = label
		.trim()
		.split(/\s+/)
		.map((word) => word.split('-').map(escapeRegExp).join(String.raw`\s*-\s*`));
	return new RegExp(words.join(String.raw`\s+`));
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches `pattern` in the stretch of text after `label`, stopping at the
 * next occurrence of any other known label.
 */
function matchInSection(
	text: string,
	label: string,
	labels: string[],
	pattern: RegExp,
): RegExpMatchArray | null {
	const found = labelPattern(label).exec(text);
	if (!found) return null;

	let section = text.slice(found.index + found[0].length);
	for (const other of labels) {
		if (other === label) continue;
		const next = labelPattern(other).exec(section);
		if (next) section = section.slice(0, next.index);
	}

	return section.match(pattern);
}

function findLatestRow($: CheerioAPI, selectors: string[]): Cheerio<Element> | undefined {
	for (const selector of selectors) {
		const row = $<Element, string>(selector)
			.filter((_, el) => $(el).find(HEADER_CELLS).length === 0)
			.first();
		if (row.length > 0) return row;
	}
	return undefined;
}

function readCell(cells: Cheerio<Element>, index: number): string | undefined {
	const cell = cells.eq(index);
	if (cell.length === 0) return undefined;

	const marked = cell.find('[datetime], [title]').addBack('[datetime], [title]').first();
	for (const attribute of MACHINE_ATTRIBUTES) {
		const value = marked.attr(attribute)?.trim();
		if (value) return value;
	}

	const visible = sanitizeText(cell.text());
	return visible === '' ? undefined : visible;
}
