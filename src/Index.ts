#!/usr/bin/env node
// src/Index.ts
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { ExecConfReader } from './reader/ExecConfReader';
import { EnvironmentReader } from './reader/EnvironmentReader';
import { SalesforceAuthenticator } from './salesforce/SalesforceAuthenticator';
import { GoogleDriveClient } from './drive/GoogleDriveClient';
import { PipelineOrchestrator } from './processor/PipelineOrchestrator';
import { errorMessage } from './model/PipelineError';

interface CliOptions {
  confFile: string;
  outputFolder?: string;
  skipUpload?: boolean;
}

async function main(): Promise<number> {
  // Load environment variables from .env file
  dotenv.config();

  const program = new Command();
  program
    .name('sf-drive-export')
    .requiredOption('-c, --confFile <path>', 'Path to the YAML configuration file')
    .option('-o, --outputFolder <path>', 'Folder where the data file and statistics log are written')
    .option('--skip-upload', 'Write the local file only, without uploading it to Google Drive')
    .parse(process.argv);
  const options = program.opts<CliOptions>();

  const environment = EnvironmentReader.read();
  const execConf = ExecConfReader.readConfFile(options.confFile, {
    outputFolder: options.outputFolder ?? environment.localFolder,
    driveFolderName: environment.driveFolderName,
    skipUpload: options.skipUpload,
  });

  const orchestrator = new PipelineOrchestrator(execConf, {
    salesforce: new SalesforceAuthenticator(
      environment.salesforce,
      execConf.appConfiguration.apiVersion,
      execConf.appConfiguration.maxFetch
    ),
    drive: GoogleDriveClient.connector(execConf.drive.credentialsFile),
  });

  const outcome = await orchestrator.run();
  if (outcome.state === 'FAILED') {
    console.error(`Run failed during ${outcome.failedStage}. See ${orchestrator.statisticsLogPath}`);
    return 1;
  }
  return 0;
}

main()
  .then(exitCode => {
    process.exitCode = exitCode;
  })
  .catch(error => {
    console.error('Failed to run the export:', errorMessage(error));
    process.exitCode = 1;
  });
