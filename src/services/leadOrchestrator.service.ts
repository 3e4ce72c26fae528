/**
 * Lead Orchestrator Service
 *
 * Runs one form submission through the lead pipeline:
 *
 *   normalizing -> matching -> resolvingAddress -> assembling -> creating -> done
 *
 * Any step may end in failed. Platform records created before a failure
 * are reported on the outcome, never rolled back, so a resubmission can
 * pick them up (the customer then matches exactly).
 */

import logger, { type Logger } from '../config/logger';
import type { Contact, CustomerCandidate, MatchField, MatchResult } from '../types/customer.types';
import type { FieldServiceGateway } from '../types/fieldService.types';
import type { FormSubmission, SubmittedForm } from '../types/form.types';
import type {
  CreatedArtifacts,
  GatewayOperation,
  LeadFailure,
  LeadOutcome,
  LeadRequest,
  PipelineStage,
} from '../types/lead.types';
import { errorMessage, isUpstreamError, isValidationError } from '../utils/errors.util';
import { maskPhoneNumber } from '../utils/phoneNumber.util';
import { resolveAddress } from './addressResolver.service';
import { normalizeContact } from './contactNormalizer.service';
import { findMatchingCustomer, matchedFieldsFor } from './customerMatcher.service';
import { parseCustomerType, parseFormSubmission } from './formParser.service';
import { assembleLead, buildPrivateNote } from './leadAssembler.service';

export interface LeadPipelineSettings {
  /** Employee every lead is assigned to */
  employeeId: string;
  leadSource: string;
  defaultAreaCode: string;
  defaultState: string;
  /** Minimum similarity for reusing an address on file */
  addressMatchThreshold: number;
}

type ActiveStage = LeadFailure['stage'];

interface ChosenCustomer {
  customerId: string;
  /** Existing record, null when this submission created the customer */
  existing: CustomerCandidate | null;
}

const otherField = (field: MatchField): MatchField => (field === 'phone' ? 'email' : 'phone');

export const partialMatchWarning = (customerId: string, matched: MatchField): string =>
  `Partial match: ${matched} matched customer ${customerId} but ${otherField(matched)} did not. ` +
  'Please verify this is the correct customer.';

export const possibleDuplicateWarning = (
  existingId: string,
  matched: MatchField,
  newId: string
): string =>
  `Possible duplicate: existing customer ${existingId} matches on ${matched} only; ` +
  `created new customer ${newId} for manual review.`;

export const ambiguousMatchWarning = (
  others: readonly { customerId: string; matchedOn: readonly MatchField[] }[]
): string =>
  'Ambiguous match: other customers also match this contact: ' +
  others.map((other) => `${other.customerId} (${other.matchedOn.join(', ')})`).join('; ');

export const MISSING_ADDRESS_WARNING = 'No service address submitted; lead created without an address.';

export const addressMismatchWarning = (
  address: string,
  customerId: string,
  onFile: number,
  bestScore: number
): string =>
  `Address mismatch: "${address}" did not match any of the ${onFile} address(es) on file for ` +
  `customer ${customerId} (best similarity ${bestScore.toFixed(2)}); created a new service address.`;

/**
 * State of one submission as it moves through the pipeline
 */
class PipelineRun {
  stage: ActiveStage = 'normalizing';
  step?: GatewayOperation;
  readonly warnings: string[] = [];
  readonly created: CreatedArtifacts = {};

  constructor(readonly log: Logger) {}

  enter(stage: PipelineStage): void {
    this.log.debug({ from: this.stage, to: stage }, 'Pipeline transition');
    if (stage !== 'done' && stage !== 'failed') {
      this.stage = stage;
    }
  }

  warn(message: string): void {
    this.warnings.push(message);
    this.log.warn({ warning: message }, 'Submission warning');
  }

  /**
   * Gateway view that records the current step and created records
   */
  track(gateway: FieldServiceGateway): FieldServiceGateway {
    const call = async <T>(operation: GatewayOperation, task: () => Promise<T>): Promise<T> => {
      this.step = operation;
      const result = await task();
      this.step = undefined;
      return result;
    };

    return {
      findCustomersByPhone: (phone) =>
        call('findCustomersByPhone', () => gateway.findCustomersByPhone(phone)),
      findCustomersByEmail: (email) =>
        call('findCustomersByEmail', () => gateway.findCustomersByEmail(email)),
      createCustomer: async (contact) => {
        const customerId = await call('createCustomer', () => gateway.createCustomer(contact));
        this.created.customerId = customerId;
        return customerId;
      },
      createAddress: async (customerId, address) => {
        const addressId = await call('createAddress', () =>
          gateway.createAddress(customerId, address)
        );
        this.created.addressId = addressId;
        return addressId;
      },
      createLead: (lead) => call('createLead', () => gateway.createLead(lead)),
    };
  }

  fail(error: unknown): LeadFailure {
    const errorKind = isValidationError(error)
      ? 'validation'
      : isUpstreamError(error)
        ? 'upstream'
        : 'internal';
    const step = isUpstreamError(error) ? error.operation : this.step;

    const failure: LeadFailure = {
      status: 'failed',
      stage: this.stage,
      errorKind,
      step,
      statusCode: isUpstreamError(error) ? error.statusCode : undefined,
      message: errorKind === 'validation' ? errorMessage(error) : this.describe(error, step),
      created: { ...this.created },
      warnings: [...this.warnings],
    };

    if (errorKind === 'internal') {
      this.log.error({ err: error, stage: this.stage, step }, 'Lead pipeline crashed');
    } else {
      this.log.error(
        { stage: this.stage, step, errorKind, created: failure.created, error: failure.message },
        'Lead pipeline failed'
      );
    }

    return failure;
  }

  private describe(error: unknown, step: GatewayOperation | undefined): string {
    const createdParts: string[] = [];
    if (this.created.customerId) createdParts.push(`customer ${this.created.customerId}`);
    if (this.created.addressId) createdParts.push(`address ${this.created.addressId}`);

    const failing = step ?? this.stage;
    return createdParts.length > 0
      ? `${failing} failed after creating ${createdParts.join(' and ')}: ${errorMessage(error)}`
      : `${failing} failed: ${errorMessage(error)}`;
  }
}

export class LeadOrchestrator {
  private log = logger.child({ service: 'lead-orchestrator' });

  constructor(
    private readonly gateway: FieldServiceGateway,
    private readonly settings: LeadPipelineSettings
  ) {}

  /**
   * Process one submission
   *
   * Never rejects: every failure is returned as a LeadFailure.
   *
   * @param submission - Field list or flat object from the webhook
   * @param requestLogger - Logger carrying the request id, when there is one
   */
  async process(submission: FormSubmission, requestLogger?: Logger): Promise<LeadOutcome> {
    const run = new PipelineRun(requestLogger ?? this.log);
    const gateway = run.track(this.gateway);

    try {
      const form = parseFormSubmission(submission);
      const contact = normalizeContact(form, {
        defaultAreaCode: this.settings.defaultAreaCode,
        defaultState: this.settings.defaultState,
      });

      run.log.info(
        { phoneNumber: maskPhoneNumber(contact.phone), customerType: form.customerType },
        'Processing website lead'
      );

      run.enter('matching');
      const match = await findMatchingCustomer(contact, gateway);
      const customer = await this.chooseCustomer(run, gateway, form, contact, match);

      run.enter('resolvingAddress');
      const addressId = await this.resolveServiceAddress(run, gateway, contact, customer);

      run.enter('assembling');
      const assembled = assembleLead(form);
      for (const warning of assembled.warnings) {
        run.warn(warning);
      }

      const lead: LeadRequest = {
        customerId: customer.customerId,
        addressId,
        employeeId: this.settings.employeeId,
        leadSource: this.settings.leadSource,
        jobType: assembled.jobType,
        lineItems: assembled.lineItems,
        privateNote: buildPrivateNote(form.rawFields, match, run.warnings),
      };

      run.enter('creating');
      const leadId = await gateway.createLead(lead);

      run.enter('done');
      run.log.info(
        { customerId: customer.customerId, leadId, matchType: match.classification },
        'Website lead created'
      );

      return {
        status: 'done',
        customerId: customer.customerId,
        addressId,
        leadId,
        matchType: match.classification,
        customerCreated: customer.existing === null,
        addressCreated: run.created.addressId !== undefined,
        warnings: [...run.warnings],
      };
    } catch (error) {
      return run.fail(error);
    }
  }

  private async chooseCustomer(
    run: PipelineRun,
    gateway: FieldServiceGateway,
    form: SubmittedForm,
    contact: Contact,
    match: MatchResult
  ): Promise<ChosenCustomer> {
    let chosen: ChosenCustomer;

    if (match.classification === 'none') {
      chosen = { customerId: await gateway.createCustomer(contact), existing: null };
    } else if (match.classification === 'exact') {
      chosen = { customerId: match.matchedCustomerId, existing: match.matchedCandidate };
    } else {
      const matchedField: MatchField = match.matchedOn.has('phone') ? 'phone' : 'email';

      if (parseCustomerType(form.customerType) === 'existing') {
        run.warn(partialMatchWarning(match.matchedCustomerId, matchedField));
        chosen = { customerId: match.matchedCustomerId, existing: match.matchedCandidate };
      } else {
        const customerId = await gateway.createCustomer(contact);
        run.warn(possibleDuplicateWarning(match.matchedCustomerId, matchedField, customerId));
        chosen = { customerId, existing: null };
      }
    }

    const chosenMatchId = match.classification === 'none' ? null : match.matchedCustomerId;
    const others = match.allCandidates
      .filter((candidate) => candidate.customerId !== chosenMatchId)
      .map((candidate) => ({
        customerId: candidate.customerId,
        matchedOn: (['phone', 'email'] as const).filter((field) =>
          matchedFieldsFor(candidate, contact).has(field)
        ),
      }))
      .filter((other) => other.matchedOn.length > 0);

    if (others.length > 0) {
      run.warn(ambiguousMatchWarning(others));
    }

    return chosen;
  }

  private async resolveServiceAddress(
    run: PipelineRun,
    gateway: FieldServiceGateway,
    contact: Contact,
    customer: ChosenCustomer
  ): Promise<string | null> {
    if (contact.address === null) {
      run.warn(MISSING_ADDRESS_WARNING);
      return null;
    }

    if (customer.existing === null) {
      return gateway.createAddress(customer.customerId, contact.address);
    }

    const onFile = customer.existing.addresses;
    const decision = resolveAddress(contact.address, onFile, this.settings.addressMatchThreshold);
    run.log.info(
      { action: decision.action, similarityScore: decision.similarityScore, onFile: onFile.length },
      'Address resolved'
    );

    if (decision.action === 'reuse' && decision.matchedAddressId) {
      return decision.matchedAddressId;
    }

    const addressId = await gateway.createAddress(customer.customerId, contact.address);
    if (onFile.length > 0) {
      run.warn(
        addressMismatchWarning(contact.rawAddress, customer.customerId, onFile.length, decision.similarityScore)
      );
    }

    return addressId;
  }
}
