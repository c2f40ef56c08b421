import { format, isValid, parse } from 'date-fns';
import type { InputFieldDescriptor, InputKind } from '../../types';
import { text, type Resolver } from './types';

const INPUT_KINDS: InputKind[] = ['text', 'area', 'date', 'select', 'check'];

// Date formats as written in INPUT directives, mapped to date-fns tokens
const DATE_FORMATS: Record<string, string> = {
  'YYYY/MM/DD': 'yyyy/MM/dd',
  'DD/MM/YYYY': 'dd/MM/yyyy',
  'MM/DD/YYYY': 'MM/dd/yyyy'
};
const ISO_DATE = 'yyyy-MM-dd';
const DEFAULT_DATE_FORMAT = 'YYYY/MM/DD';

function inputKind(value: string): InputKind | 'unknown' {
  const kind = value.trim().toLowerCase();
  return INPUT_KINDS.find(candidate => candidate === kind) ?? 'unknown';
}

function selectOptions(fields: string[]): string[] {
  const listed = fields[2] ?? '';
  const options = listed.includes(',') || fields.length <= 3 ? listed.split(',') : fields.slice(2);
  return options.map(option => option.trim()).filter(option => option.length > 0);
}

export function formatDateInput(value: string, dateFormat: string): string {
  const pattern = DATE_FORMATS[dateFormat.trim().toUpperCase()] ?? ISO_DATE;
  const today = new Date();

  if (!value.trim() || value.trim().toLowerCase() === 'today') {
    return format(today, pattern);
  }

  const parsed = parse(value.trim(), pattern, today);
  return format(isValid(parsed) ? parsed : today, pattern);
}

/**
 * Value used when no answer was collected for the field: the default written
 * in the directive itself.
 */
export function defaultInputValue(params: string): string {
  const fields = params.split('!');
  const kind = inputKind(fields[0]);

  switch (kind) {
    case 'text':
    case 'area':
      return fields[2] ?? '';
    case 'date':
      return formatDateInput(fields[2] ?? 'today', fields[3] ?? DEFAULT_DATE_FORMAT);
    case 'select':
      return selectOptions(fields)[0] ?? '';
    case 'check':
      return String((fields[2] ?? '').trim().toLowerCase() === 'true');
    default:
      return params || '[Input value]';
  }
}

export function describeInputField(keyword: string, params: string): InputFieldDescriptor {
  const fields = params.split('!');
  const kind = inputKind(fields[0]);
  const descriptor: InputFieldDescriptor = {
    keyword,
    kind,
    label: (fields[1] ?? '').trim(),
    defaultValue: defaultInputValue(params)
  };

  if (kind === 'area' && fields[3] && /^\d+$/.test(fields[3].trim())) {
    descriptor.height = Number(fields[3].trim());
  }
  if (kind === 'date') {
    descriptor.format = (fields[3] ?? DEFAULT_DATE_FORMAT).trim();
  }
  if (kind === 'select') {
    descriptor.options = selectOptions(fields);
  }
  return descriptor;
}

export const resolveInput: Resolver = async (directive, _depth, context) => {
  const collected = context.inputs.get(`INPUT!${directive.params}`) ?? context.inputs.get(directive.params);
  return text(collected ?? defaultInputValue(directive.params));
};
