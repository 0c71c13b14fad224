import type { CreateClientDTO } from '../models/client';
import type { ValidationResult } from './validation';
import { checkLength, optionalText, requiredText, validateEmail } from './validation';

export function validateClient(data: CreateClientDTO): ValidationResult {
  const errors: string[] = [];

  if (!data.name || data.name.trim().length === 0) {
    errors.push('name is required');
  } else {
    checkLength(errors, 'name', data.name.trim(), 100);
  }

  if (data.email) {
    if (!validateEmail(data.email)) {
      errors.push('email is invalid');
    }
    checkLength(errors, 'email', data.email, 120);
  }

  checkLength(errors, 'phone', data.phone ?? null, 20);
  checkLength(errors, 'company_code', data.company_code ?? null, 20);

  return {
    valid: errors.length === 0,
    errors,
  };
}

export function normalizeClientData(data: CreateClientDTO): Required<CreateClientDTO> {
  const email = optionalText(data.email);
  const address = optionalText(data.address);

  return {
    name: requiredText(data.name),
    email: email ? email.toLowerCase() : null,
    phone: optionalText(data.phone),
    company_code: optionalText(data.company_code),
    // Collapse line breaks and runs of whitespace into single spaces
    address: address ? address.replace(/\s+/g, ' ') : null,
  };
}
