import { Transform } from 'class-transformer';
import { IsEmail, IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { ToTrimmedText } from 'src/common/transforms/form-value.transforms';

// Decorators register bottom-up and only the first failing constraint is
// shown, so the presence check sits lowest.
export class ContactFormDto {
  @ToTrimmedText()
  @MaxLength(100, { message: 'Name must be 100 characters or fewer.' })
  @IsString()
  @IsNotEmpty({ message: 'Please enter your name.' })
  name!: string;

  @Transform(({ value }) =>
    typeof value === 'string' ? value.trim().toLowerCase() : value,
  )
  @IsEmail({}, { message: 'Please enter a valid email address.' })
  @IsNotEmpty({ message: 'Please enter your email address.' })
  email!: string;
}
