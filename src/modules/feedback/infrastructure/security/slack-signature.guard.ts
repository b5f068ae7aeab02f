import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import type { Request } from 'express';
import { SlackSignatureValidationService } from './slack-signature-validation.service';

@Injectable()
export class SlackSignatureGuard implements CanActivate {
  constructor(private readonly signatureValidation: SlackSignatureValidationService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    request.slackSignature = this.signatureValidation.validateRequest(request);
    return true;
  }
}
