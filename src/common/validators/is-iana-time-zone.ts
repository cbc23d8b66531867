import { registerDecorator, ValidationArguments } from 'class-validator';

export function isIanaTimeZone(value: unknown): boolean {
  if (typeof value !== 'string' || value.trim() === '') return false;
  // DateTimeFormat resolves aliases (Asia/Kolkata, UTC) that
  // Intl.supportedValuesOf leaves out on some ICU builds
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export function IsIanaTimeZone() {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isIanaTimeZone',
      target: object.constructor,
      propertyName,
      validator: {
        validate: isIanaTimeZone,
        defaultMessage(args: ValidationArguments) {
          return `${args.property} must be a valid IANA time zone (e.g. "Asia/Kolkata")`;
        },
      },
    });
  };
}
