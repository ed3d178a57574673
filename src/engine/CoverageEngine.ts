import { CoverageConfigInput } from '../config/ConfigValidator';
import { CoverageSummary } from '../models/CoverageModels';
import { FormatterRegistry } from '../reporter/FormatterRegistry';
import { ReportFormatter } from '../reporter/ReportFormatter';
import { ReportGenerator } from '../reporter/ReportGenerator';
import { SessionState } from '../tracking/SessionControl';
import { CallSiteResolver } from './CallSiteResolver';
import { CoverageSession } from './CoverageSession';
import { defaultRegistry, SessionRegistry } from './SessionRegistry';

export interface CoverageEngineOptions {
    registry?: SessionRegistry;
    formatters?: FormatterRegistry;
    callSiteResolver?: CallSiteResolver;
}

/**
 * Entry point: starts sessions, keeps track of the running one and turns
 * finished sessions into reports
 */
export class CoverageEngine {
    private readonly registry: SessionRegistry;
    private readonly formatters: FormatterRegistry;
    private readonly reportGenerator: ReportGenerator;
    private current: CoverageSession | null = null;

    constructor(private readonly options: CoverageEngineOptions = {}) {
        this.registry = options.registry ?? defaultRegistry;
        this.formatters = options.formatters ?? new FormatterRegistry();
        this.reportGenerator = new ReportGenerator(this.formatters);
    }

    /**
     * Start a session; fails with SessionAlreadyActiveError while another
     * session of the same registry is running
     */
    start(config: CoverageConfigInput = {}): CoverageSession {
        const session = new CoverageSession(config, {
            registry: this.registry,
            callSiteResolver: this.options.callSiteResolver,
        });
        session.start();
        this.current = session;
        return session;
    }

    get activeSession(): CoverageSession | null {
        return this.current !== null && this.current.state === SessionState.Running ? this.current : null;
    }

    registerFormatter(formatter: ReportFormatter): void {
        this.formatters.registerFormatter(formatter);
    }

    getAvailableFormats(): string[] {
        return this.formatters.getAvailableFormats();
    }

    render(summary: CoverageSummary, format: string): string {
        return this.reportGenerator.render(summary, format);
    }

    /**
     * Finalize the session if it is still running and write its reports,
     * defaulting to the session's configured formats and output directory
     */
    async report(
        session: CoverageSession,
        outputDir: string = session.config.report.output_dir,
        formats: string[] = session.config.report.formats
    ): Promise<Record<string, string>> {
        if (session.state === SessionState.Running) {
            session.stop();
        }
        return await this.reportGenerator.generateReports(session.summary(), outputDir, formats);
    }
}
