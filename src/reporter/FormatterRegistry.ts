import { AnnotatedListingFormatter } from './AnnotatedListingFormatter';
import { CoberturaFormatter } from './CoberturaFormatter';
import { JsonFormatter } from './JsonFormatter';
import { LcovFormatter } from './LcovFormatter';
import { ReportFormatter } from './ReportFormatter';
import { SummaryFormatter } from './SummaryFormatter';
import logger from '../utils/logger';

/**
 * Registry for all report formatters
 */
export class FormatterRegistry {
    private formatters: Map<string, ReportFormatter> = new Map();

    constructor(includeBuiltIns: boolean = true) {
        if (includeBuiltIns) {
            this.registerFormatter(new AnnotatedListingFormatter());
            this.registerFormatter(new SummaryFormatter());
            this.registerFormatter(new JsonFormatter());
            this.registerFormatter(new LcovFormatter());
            this.registerFormatter(new CoberturaFormatter());
        }
    }

    /**
     * Register a formatter, replacing any with the same name
     */
    registerFormatter(formatter: ReportFormatter): void {
        if (this.formatters.has(formatter.name)) {
            logger.warn(`Replacing report formatter: ${formatter.name}`);
        }
        this.formatters.set(formatter.name, formatter);
        logger.debug(`Registered report formatter: ${formatter.name}`);
    }

    getFormatter(name: string): ReportFormatter | null {
        return this.formatters.get(name) ?? null;
    }

    getAvailableFormats(): string[] {
        return Array.from(this.formatters.keys()).sort();
    }
}
