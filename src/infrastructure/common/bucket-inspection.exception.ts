import { HttpException, HttpStatus } from '@nestjs/common';
import {
  InspectionFailure,
  InspectionFailureKind,
} from '../../domain/types/inspection.types';
import { toFailureResponse } from '../controllers/dto/bucket-responses.dto';

export const FAILURE_STATUS: Record<InspectionFailureKind, HttpStatus> = {
  InvalidFormat: HttpStatus.BAD_REQUEST,
  EmptyBucket: HttpStatus.INTERNAL_SERVER_ERROR,
  StaleObject: HttpStatus.INTERNAL_SERVER_ERROR,
  ListPermissionDenied: HttpStatus.INTERNAL_SERVER_ERROR,
  BucketAccessError: HttpStatus.INTERNAL_SERVER_ERROR,
  Unexpected: HttpStatus.INTERNAL_SERVER_ERROR,
};

export class BucketInspectionException extends HttpException {
  constructor(readonly failure: InspectionFailure) {
    super(toFailureResponse(failure), FAILURE_STATUS[failure.kind]);
  }
}
