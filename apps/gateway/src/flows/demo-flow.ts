import { Flow } from '@turnflow/core';

const PLANS = {
  basic: 'Basic',
  plus: 'Plus',
  premium: 'Premium',
} as const;

/**
 * Sample sign-up conversation served by both transports. Answering "No" at
 * the confirmation step goes back to the plan menu.
 */
export class RegistrationFlow extends Flow {
  start(): void {
    const name = this.app.screen('name', (prompt) =>
      prompt.ask('Welcome! What is your name?', {
        validate: (value) => (value.trim().length < 2 ? 'Please enter at least 2 characters.' : null),
        transform: (value) => value.trim(),
      }),
    );

    const age = this.app.screen('age', (prompt) =>
      prompt.ask(`How old are you, ${name}?`, {
        convert: (input) => Number.parseInt(input, 10),
        validate: (value) => {
          if (Number.isNaN(value)) {
            return 'Please enter a number.';
          }
          return value < 16 ? 'You must be at least 16 to register.' : null;
        },
      }),
    );

    const plan = this.app.screen('plan', (prompt) => prompt.select('Choose a plan', PLANS));

    const confirmed = this.app.screen('confirm', (prompt) =>
      prompt.yesNo(`Register ${name} (${age}) on the ${PLANS[plan]} plan?`),
    );

    if (!confirmed) {
      this.app.session.delete('plan');
      this.app.goBack();
    }

    const greeting = this.app.contactName ? ` See you soon, ${this.app.contactName}.` : '';
    this.app.say(`Thanks ${name}! You are registered on the ${PLANS[plan]} plan.${greeting}`);
  }
}
