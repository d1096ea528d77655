import { describeStatus, detectStatusFromText } from './status';
import { parseLookupInput } from './input';
import { InvalidInputError } from '../utils/errors';

describe('detectStatusFromText', () => {
  it('should treat an offer of a current certificate as compliant', () => {
    expect(
      detectStatusFromText('Results  Click here to request a current Certificate of Clean Hands for this taxpayer')
    ).toBe('compliant');
  });

  it('should treat an offer of a non-compliance notice as noncompliant', () => {
    expect(detectStatusFromText('Click here to request a Notice of Non-Compliance')).toBe('noncompliant');
    expect(detectStatusFromText('You may request a notice of noncompliance')).toBe('noncompliant');
  });

  it('should read explicit negative phrases before positive ones', () => {
    expect(detectStatusFromText('The taxpayer is not in compliance.')).toBe('noncompliant');
    expect(detectStatusFromText('Status: NOT COMPLIANT')).toBe('noncompliant');
    expect(detectStatusFromText('Account flagged non-compliant')).toBe('noncompliant');
  });

  it('should read explicit positive phrases', () => {
    expect(detectStatusFromText('This taxpayer is currently compliant.')).toBe('compliant');
    expect(detectStatusFromText('Entity is in compliance with DC tax law')).toBe('compliant');
  });

  it('should return unknown for unrelated or missing text', () => {
    expect(detectStatusFromText('No records found')).toBe('unknown');
    expect(detectStatusFromText('')).toBe('unknown');
    expect(detectStatusFromText(null)).toBe('unknown');
  });

  it('should describe the outcome', () => {
    expect(describeStatus('compliant')).toBe('Detected compliance status from page.');
    expect(describeStatus('unknown')).toBe('Could not detect compliance status.');
  });
});

describe('parseLookupInput', () => {
  it('should accept and trim a valid lookup', () => {
    expect(parseLookupInput({ notice: ' L0012345678 ', last4: '1234' })).toEqual({
      notice: 'L0012345678',
      last4: '1234',
    });
  });

  it('should reject a short notice number', () => {
    expect(() => parseLookupInput({ notice: 'L1', last4: '1234' })).toThrow(
      'Invalid notice number: "L1". Expected 5 to 64 characters.'
    );
  });

  it('should reject last 4 digits that are not four digits', () => {
    expect(() => parseLookupInput({ notice: 'L0012345678', last4: '12a4' })).toThrow(InvalidInputError);
    expect(() => parseLookupInput({ notice: 'L0012345678', last4: '12345' })).toThrow(
      'Invalid last 4 digits: "12345". Expected exactly four digits.'
    );
  });

  it('should report a missing notice', () => {
    expect(() => parseLookupInput({ last4: '1234' })).toThrow('Invalid notice number: "".');
  });
});
