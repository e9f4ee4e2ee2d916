// Load environment variables from .env file
import 'dotenv/config';

import * as path from 'path';
import { loadRunConfig } from '../server/config/run-config';
import { KEYPHRASE_CONFIG_PATH } from '../server/config/keyphrase-extraction';
import { loadDocuments } from '../server/document-loader';
import { ConfigurationError } from '../server/errors';
import { writeRunOutput } from '../server/keyphrase-export';
import { OpenAIKeyphraseExtractor } from '../server/keyphrase-extractor';
import { runKeyphrasePipeline } from '../server/keyphrase-pipeline';
import { logger } from '../server/utils/logger';

interface CliArgs {
    input: string;
    output: string;
    config: string;
    csv?: string;
}

function parseArgs(argv: string[]): CliArgs {
    const values = new Map<string, string>();
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg.startsWith('--') && i + 1 < argv.length) {
            values.set(arg.slice(2), argv[++i]);
        }
    }

    const input = values.get('input') ?? './keywords';
    return {
        input,
        output: values.get('output') ?? path.join(input, 'extracted_keyphrases.json'),
        config: values.get('config') ?? KEYPHRASE_CONFIG_PATH,
        csv: values.get('csv'),
    };
}

async function main() {
    const args = parseArgs(process.argv.slice(2));

    console.log('='.repeat(60));
    console.log('Keyphrase Extraction');
    console.log('='.repeat(60));
    console.log(`  Input directory:  ${args.input}`);
    console.log(`  Output file:      ${args.output}`);
    console.log(`  Configuration:    ${args.config}\n`);

    const config = loadRunConfig(args.config);
    const documents = loadDocuments(args.input, config, { excludePaths: [args.output] });

    const controller = new AbortController();
    process.once('SIGINT', () => {
        console.log('\nCancelling: finishing in-flight extractions and ranking partial results...');
        controller.abort();
    });

    const result = await runKeyphrasePipeline(documents, config, new OpenAIKeyphraseExtractor(), {
        signal: controller.signal,
    });

    writeRunOutput(result, {
        outputPath: args.output,
        csvPath: args.csv,
        configuration: { inputDir: args.input, configPath: args.config, globalTarget: config.globalTarget },
    });

    const { summary } = result;
    console.log(`\n${'='.repeat(60)}`);
    console.log('SUMMARY');
    console.log('='.repeat(60));
    console.log(`Documents processed: ${summary.documentsProcessed}`);
    console.log(`Documents degraded:  ${summary.documentsDegraded}`);
    console.log(`Documents skipped:   ${summary.documentsSkipped}`);
    console.log(`Clusters:            ${summary.clusterCount}`);
    console.log(`Admitted:            ${summary.admittedCount} / ${summary.globalTarget}`);
    console.log(`Audit entries:       ${result.auditLog.length}`);
    console.log('\nBy category:');
    for (const [category, count] of Object.entries(summary.categories)) {
        console.log(`  ${category}: ${count}`);
    }
    console.log('\nSample keyphrases (first 20):');
    for (const keyphrase of result.keyphrases.slice(0, 20)) {
        console.log(`  - ${keyphrase.text} (${keyphrase.category}, ${keyphrase.score})`);
    }
}

main().catch((error) => {
    if (error instanceof ConfigurationError) {
        logger.error('Configuration error, no extraction calls were made', error);
    } else {
        logger.error('Keyphrase extraction failed', error);
    }
    process.exit(1);
});
