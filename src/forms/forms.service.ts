import { Injectable, Logger } from '@nestjs/common';
import { ContactFormDto } from './dto/contact-form.dto';
import type { ContactDetails } from 'src/common/types/session';

@Injectable()
export class FormsService {
  private readonly logger = new Logger(FormsService.name);

  acceptContact(dto: ContactFormDto): ContactDetails {
    const contact: ContactDetails = { name: dto.name, email: dto.email };
    this.logger.log(`Contact form accepted for ${contact.email}`);
    return contact;
  }

  successMessage(contact: ContactDetails): string {
    return `Thanks, ${contact.name}! Let's find the right green finance track for you.`;
  }
}
