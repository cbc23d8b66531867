import { ContactPageFilter } from './contact-page.filter';
import {
  createMockReq,
  createMockRes,
  createMockHost,
} from 'src/test/factories/mock-http.factory';
import { FormValidationError } from 'src/errors';

describe('Contact page filter mapping', () => {
  beforeEach(() => jest.clearAllMocks());

  it('FORM_VALIDATION_FAILED → 400 re-render of index with name/email kept', () => {
    const req = createMockReq({
      method: 'POST',
      url: '/submit-form',
      body: { name: 'Asha', email: 'not-an-email', extra: 'dropped' },
    });
    const res = createMockRes();

    ContactPageFilter.catch(
      new FormValidationError({ email: 'Please enter a valid email address.' }),
      createMockHost(req, res),
    );

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.render).toHaveBeenCalledWith('index', {
      errors: [
        {
          message: 'Please correct the highlighted fields.',
          code: 'FORM_VALIDATION_FAILED',
        },
      ],
      form: { name: 'Asha', email: 'not-an-email' },
      fieldErrors: { email: 'Please enter a valid email address.' },
    });
    expect(res.redirect).not.toHaveBeenCalled();
    expect(req.session.flash).toBeUndefined();
  });
});
