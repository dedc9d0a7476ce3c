#!/usr/bin/env node
import { getConfig, validateConfig } from './config';
import { createDependencies } from './dependencies';
import { CLI_MODES, ImageStudioCli, ReadlinePrompter, isCliMode } from './presentation/cli/ImageStudioCli';

async function main(argv: string[]): Promise<number> {
    const mode = argv[0] ?? 'edit';
    if (!isCliMode(mode)) {
        console.error(`❌ Unknown mode "${mode}". Use one of: ${CLI_MODES.join(', ')}`);
        return 1;
    }

    const config = getConfig();
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        console.error('❌ Configuration validation failed:');
        configErrors.forEach((error) => console.error(`  - ${error}`));
        return 1;
    }

    const deps = createDependencies(config);
    const cli = new ImageStudioCli({
        pipeline: deps.pipeline,
        materializer: deps.materializer,
        credentials: deps.credentials,
        prompter: new ReadlinePrompter(),
        outputPath: config.outputPath,
        maskOutputPath: config.maskOutputPath,
    });
    return cli.run(mode);
}

main(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error) => {
        console.error('💥 Fatal error:', error);
        process.exitCode = 1;
    });
