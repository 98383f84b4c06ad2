import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationChain, ValidationError } from 'express-validator';

export interface FieldProblem {
  field: string;
  message: string;
}

export type InvalidRequestHandler = (res: Response, problems: FieldProblem[]) => void;

function toProblem(error: ValidationError): FieldProblem {
  return {
    field: error.type === 'field' ? error.path : error.type,
    message: String(error.msg),
  };
}

const respondValidationFailed: InvalidRequestHandler = (res, problems) => {
  res.status(400).json({ error: 'Validation failed', details: problems });
};

/**
 * Runs the chains and answers 400 when any fails. Routes with their own
 * response shape pass `onInvalid`.
 */
export function validate(validations: ValidationChain[], onInvalid: InvalidRequestHandler = respondValidationFailed) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await Promise.all(validations.map((v) => v.run(req)));
    const errors = validationResult(req);
    if (errors.isEmpty()) {
      next();
      return;
    }
    onInvalid(res, errors.array().map(toProblem));
  };
}
