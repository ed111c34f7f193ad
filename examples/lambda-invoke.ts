/**
 * Example: Invoking a Lambda function and telling apart the three ways it
 * can go wrong: a local validation error, a service error, and an error
 * raised by the function itself.
 */

import {
  LambdaClient,
  MissingRequiredFieldError,
  ServiceError,
  lambda,
} from '../src/index.js';

const client = new LambdaClient();

try {
  const result = await client.invoke({
    functionName: 'resize-image',
    invocationType: lambda.InvocationType.RequestResponse,
    logType: lambda.LogType.Tail,
    payload: JSON.stringify({ key: 'uploads/cat.png', width: 320 }),
  });

  if (result.functionError !== undefined) {
    console.error(`Function failed (${result.functionError}): ${result.payload ?? ''}`);
  } else {
    console.log(`Version ${result.executedVersion ?? '?'} answered: ${result.payload ?? ''}`);
  }
  if (result.logResult !== undefined) {
    console.log(Buffer.from(result.logResult, 'base64').toString('utf8'));
  }
} catch (error) {
  if (error instanceof MissingRequiredFieldError) {
    console.error(`Fix the input: ${error.field} is required`);
  } else if (error instanceof lambda.TooManyRequestsException) {
    console.error(`Throttled (${error.reason ?? 'unknown'}), retry in ${error.retryAfterSeconds ?? 1}s`);
  } else if (error instanceof ServiceError) {
    console.error(`Lambda answered ${error.statusCode}: ${error.awsCode ?? 'no code'}`);
  } else {
    throw error;
  }
}
