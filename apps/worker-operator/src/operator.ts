import { SF } from '@loki-worker/service-framework-node';
import { createOperatorContext } from './context.js';
import { runOperatorService } from './operatorService.js';

async function bootstrap(): Promise<void> {
  process.exitCode = await SF.runProcessLifecycle(async (processContext) => {
    const context = createOperatorContext(processContext);

    await runOperatorService(context);

    return {
      diagnosticContext: context.diagnosticContext,
    };
  });
}

void bootstrap();
