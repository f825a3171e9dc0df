#!/usr/bin/env node
import { Command } from 'commander';
import { CompaniesHouseClient } from './clients/companies_house';
import { HttpPageFetcher } from './clients/page_fetcher';
import { SerpApiSearchProvider } from './clients/serpapi_search';
import { GovUkSponsorRegister } from './clients/sponsor_register';
import { loadConfig, type AppConfig } from './config';
import { StateStore } from './db/state_store';
import { exportLeadsCsv } from './export/csv_exporter';
import { LeadRun } from './pipeline/lead_run';
import { ConfigurationError, toError } from './utils/errors';
import { Logger } from './utils/logger';

function bootstrap(): AppConfig {
    const config = loadConfig({ loadDotenv: true });
    Logger.configure(config.logging);
    return config;
}

async function withStore<T>(config: AppConfig, fn: (store: StateStore) => Promise<T> | T): Promise<T> {
    const store = new StateStore(config.runtime.sqlitePath);
    try {
        return await fn(store);
    } finally {
        store.close();
    }
}

function fail(err: unknown): void {
    const error = toError(err);
    if (error instanceof ConfigurationError) {
        Logger.fatal(`Configuration error: ${error.message}`);
    } else {
        Logger.logError('Command failed', error);
    }
    process.exitCode = 1;
}

const program = new Command();

program
    .name('lead-radar')
    .description('Daily UK company leads from the sponsor register and new incorporations')
    .version('1.0.0');

program
    .command('run')
    .description('Run one ingestion, scoring and enrichment pass and export the leads')
    .action(async () => {
        try {
            const config = bootstrap();
            if (!config.runtime.outputCsvPath) {
                throw new ConfigurationError('OUTPUT_CSV_PATH is required');
            }
            const registry = new CompaniesHouseClient(config);
            const search = new SerpApiSearchProvider(config);

            const report = await withStore(config, (store) => new LeadRun({
                config,
                store,
                registry,
                sponsors: new GovUkSponsorRegister(config),
                search,
                fetcher: new HttpPageFetcher(config),
            }).execute());

            const file = await exportLeadsCsv(report.leads, config.runtime.outputCsvPath);
            Logger.info(`🏁 ${report.leads.length} leads written`, {
                run_id: report.run_id,
                baseline: report.baseline,
                file,
            });
        } catch (err) {
            fail(err);
        }
    });

program
    .command('suppress')
    .description('Exclude a company from all future output')
    .argument('<identifier>', 'Company number (or stored entity key)')
    .option('-r, --reason <text>', 'Why the company is suppressed', 'manual')
    .action(async (identifier: string, options: { reason: string }) => {
        try {
            const config = bootstrap();
            await withStore(config, (store) => store.suppress(identifier.trim().toUpperCase(), options.reason, new Date()));
            Logger.info(`🚫 Suppressed ${identifier}`, { reason: options.reason });
        } catch (err) {
            fail(err);
        }
    });

program
    .command('stats')
    .description('Print state store counters')
    .action(async () => {
        try {
            const config = bootstrap();
            const stats = await withStore(config, (store) => store.getStats());
            process.stdout.write(`${JSON.stringify(stats, null, 2)}\n`);
        } catch (err) {
            fail(err);
        }
    });

program.parseAsync(process.argv).catch(fail);
