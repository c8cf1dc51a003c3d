import { Command } from 'commander';
import { formatValidationIssues } from '../../common/validation/validation-issues';
import { lintWorkflowFile } from '../../tooling/workflow/workflow-lint';
import { runCommand } from '../run-command';

export function createCheckWorkflowCommand(): Command {
  return new Command('check-workflow')
    .description('Report misspelt keys and malformed steps in CI workflows')
    .argument('<files...>', 'Workflow YAML files')
    .action((files: string[]) =>
      runCommand(async () => {
        let failed = false;

        for (const file of files) {
          const issues = await lintWorkflowFile(file);
          if (issues.length === 0) {
            console.log(`${file}: OK`);
            continue;
          }
          failed = true;
          console.error(`${file}:\n${formatValidationIssues(issues)}`);
        }

        if (failed) {
          process.exitCode = 1;
        }
      }),
    );
}
