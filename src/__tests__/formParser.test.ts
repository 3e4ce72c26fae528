import { describe, it, expect } from 'vitest';
import {
  formatFieldValue,
  parseCustomerType,
  parseFormSubmission,
  toFormFields,
} from '../services/formParser.service';
import type { FormField } from '../types/form.types';

const widgetFields: FormField[] = [
  { fieldName: 'First Name', fieldValue: 'Sarah' },
  { fieldName: 'Last Name', fieldValue: 'Chen' },
  { fieldName: 'Email Address', fieldValue: 'Sarah.Chen@Example.com' },
  { fieldName: 'Phone Number', fieldValue: '(415) 555-0134' },
  { fieldName: 'Street Address', fieldValue: '456 Oak Ave' },
  { fieldName: 'Street Address Line 2', fieldValue: 'Unit 3' },
  { fieldName: 'City', fieldValue: 'San Francisco' },
  { fieldName: 'State', fieldValue: 'CA' },
  { fieldName: 'Postal / Zip Code', fieldValue: '94115' },
  { fieldName: 'Are you a new or existing customer?', fieldValue: 'Existing Customer' },
  { fieldName: 'Preferred method of contact', fieldValue: 'Text' },
  { fieldName: 'SMS Consent', fieldValue: 'true' },
  { fieldName: 'Service Needed', fieldValue: 'Service or Repair' },
  { fieldName: 'Service Details', fieldValue: ['Water Heater', 'Garbage Disposal'] },
  { fieldName: 'Service Request Details', fieldValue: 'Leaking tank' },
  {
    fieldName: 'Images / Plans / Specs',
    fieldValue: ['https://files.example.com/a.jpg'],
    fieldType: 'file',
  },
  { fieldName: 'How did you hear about us?', fieldValue: 'Google' },
];

describe('parseFormSubmission', () => {
  it('maps widget fields onto form slots', () => {
    const form = parseFormSubmission(widgetFields);

    expect(form).toMatchObject({
      firstName: 'Sarah',
      lastName: 'Chen',
      email: 'Sarah.Chen@Example.com',
      phone: '(415) 555-0134',
      street: '456 Oak Ave',
      streetLine2: 'Unit 3',
      city: 'San Francisco',
      state: 'CA',
      zip: '94115',
      customerType: 'Existing Customer',
      preferredContact: 'Text',
      smsConsent: true,
      serviceNeeded: 'Service or Repair',
      serviceDetails: ['Water Heater', 'Garbage Disposal'],
      requestDetails: 'Leaking tank',
      attachments: ['https://files.example.com/a.jpg'],
    });
  });

  it('keeps every field, mapped or not, in order', () => {
    const form = parseFormSubmission(widgetFields);

    expect(form.rawFields).toHaveLength(widgetFields.length);
    expect(form.rawFields[16]).toEqual({ fieldName: 'How did you hear about us?', fieldValue: 'Google' });
  });

  it('reads the flat shape with underscores as spaces', () => {
    const form = parseFormSubmission({
      name: 'Mary Jane Watson',
      email: 'mj@example.com',
      phone: '555-0199',
      address: '12 Harbor Rd, Oakland CA 94607',
      message: 'Kitchen sink clogged',
      customer_type: 'Returning',
    });

    expect(form).toMatchObject({
      fullName: 'Mary Jane Watson',
      email: 'mj@example.com',
      phone: '555-0199',
      address: '12 Harbor Rd, Oakland CA 94607',
      message: 'Kitchen sink clogged',
      customerType: 'Returning',
      serviceDetails: [],
      attachments: [],
    });
    expect(form.firstName).toBeUndefined();
  });

  it('keeps the first non-empty value for a slot', () => {
    const form = parseFormSubmission([
      { fieldName: 'Email', fieldValue: '' },
      { fieldName: 'Email Address', fieldValue: 'b@x.com' },
      { fieldName: 'Confirm Email', fieldValue: 'c@x.com' },
    ]);

    expect(form.email).toBe('b@x.com');
  });

  it('splits comma-separated service details', () => {
    const form = parseFormSubmission({ service_details: 'Water Heater, Steam / Sauna ,' });

    expect(form.serviceDetails).toEqual(['Water Heater', 'Steam / Sauna']);
  });

  it('reads SMS consent answers', () => {
    expect(parseFormSubmission({ sms_consent: 'Yes' }).smsConsent).toBe(true);
    expect(parseFormSubmission({ sms_consent: 'no' }).smsConsent).toBe(false);
    expect(parseFormSubmission({ sms_consent: false }).smsConsent).toBe(false);
    expect(parseFormSubmission({ email: 'a@x.com' }).smsConsent).toBeUndefined();
  });

  it('does not read "service request details" as a state', () => {
    const form = parseFormSubmission([{ fieldName: 'Service Request Details', fieldValue: 'Tank leak' }]);

    expect(form.state).toBeUndefined();
    expect(form.requestDetails).toBe('Tank leak');
  });
});

describe('toFormFields', () => {
  it('turns a flat object into an ordered field list', () => {
    expect(toFormFields({ first_name: 'Ann', sms_consent: true })).toEqual([
      { fieldName: 'first_name', fieldValue: 'Ann' },
      { fieldName: 'sms_consent', fieldValue: true },
    ]);
  });
});

describe('formatFieldValue', () => {
  it('renders lists, booleans, numbers and null', () => {
    expect(formatFieldValue(['a', ' b ', ''])).toBe('a, b');
    expect(formatFieldValue(true)).toBe('Yes');
    expect(formatFieldValue(false)).toBe('No');
    expect(formatFieldValue(42)).toBe('42');
    expect(formatFieldValue(null)).toBe('');
  });
});

describe('parseCustomerType', () => {
  it('recognizes existing and returning customers', () => {
    expect(parseCustomerType('Existing Customer')).toBe('existing');
    expect(parseCustomerType('returning')).toBe('existing');
  });

  it('recognizes new customers', () => {
    expect(parseCustomerType('New Customer')).toBe('new');
  });

  it('treats anything else as unspecified', () => {
    expect(parseCustomerType(undefined)).toBe('unspecified');
    expect(parseCustomerType('Not sure')).toBe('unspecified');
  });
});
