import { jest } from '@jest/globals';
import type { Page } from 'playwright';
import { FormError, NavigationError } from '../utils/errors';
import { resetLogger } from '../utils/logger';
import { MyTaxSite } from './site';

/**
 * Just enough of a DOM for the locator candidates: elements are matched by
 * role + accessible name, text, label, placeholder, tag or exact selector.
 */
interface StubElement {
  role?: string;
  name?: string;
  text?: string;
  label?: string;
  placeholder?: string;
  tag?: string;
  selectors?: string[];
  clicks: number;
  value: string | null;
  presses: string[];
}

const element = (init: Partial<StubElement>): StubElement => ({
  clicks: 0,
  value: null,
  presses: [],
  ...init,
});

class StubLocator {
  constructor(private readonly matches: () => StubElement[]) {}

  async count(): Promise<number> {
    return this.matches().length;
  }

  first(): StubLocator {
    return this.nth(0);
  }

  nth(index: number): StubLocator {
    return new StubLocator(() => this.matches().slice(index, index + 1));
  }

  async click(): Promise<void> {
    this.target().clicks += 1;
  }

  async fill(value: string): Promise<void> {
    this.target().value = value;
  }

  async press(key: string): Promise<void> {
    this.target().presses.push(key);
  }

  private target(): StubElement {
    const [match] = this.matches();
    if (!match) {
      throw new Error('Timeout 20ms exceeded waiting for locator');
    }
    return match;
  }
}

class StubPage {
  readonly elements: StubElement[] = [];
  readonly gotoLog: Array<{ url: string; waitUntil?: string }> = [];
  gotoError: Error | null = null;
  bodyText: string | Error = '';

  add(init: Partial<StubElement>): StubElement {
    const created = element(init);
    this.elements.push(created);
    return created;
  }

  getByRole(role: string, options: { name: RegExp }): StubLocator {
    return this.where((el) => el.role === role && options.name.test(el.name ?? ''));
  }

  getByText(pattern: RegExp): StubLocator {
    return this.where((el) => pattern.test(el.text ?? ''));
  }

  getByLabel(pattern: RegExp): StubLocator {
    return this.where((el) => pattern.test(el.label ?? ''));
  }

  getByPlaceholder(pattern: RegExp): StubLocator {
    return this.where((el) => pattern.test(el.placeholder ?? ''));
  }

  locator(selector: string): StubLocator {
    return this.where((el) => el.tag === selector || (el.selectors ?? []).includes(selector));
  }

  async goto(url: string, options: { waitUntil?: string } = {}): Promise<null> {
    this.gotoLog.push({ url, waitUntil: options.waitUntil });
    if (this.gotoError) {
      throw this.gotoError;
    }
    return null;
  }

  async waitForLoadState(): Promise<void> {}

  async waitForTimeout(): Promise<void> {}

  async textContent(): Promise<string> {
    if (this.bodyText instanceof Error) {
      throw this.bodyText;
    }
    return this.bodyText;
  }

  private where(match: (el: StubElement) => boolean): StubLocator {
    return new StubLocator(() => this.elements.filter(match));
  }
}

const timeouts = { navigationMs: 20, longMs: 20, shortMs: 20 };

function createSite() {
  const page = new StubPage();
  const site = new MyTaxSite(page as unknown as Page, {
    timeouts,
    pacing: { minDelayMs: 0, maxDelayMs: 0 },
    resultSettleMs: 0,
    requestSettleMs: 0,
  });
  return { page, site };
}

describe('MyTaxSite', () => {
  beforeEach(() => {
    resetLogger();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('open', () => {
    it('should navigate to the base URL', async () => {
      const { page, site } = createSite();

      await site.open('https://mytax.test/_/');

      expect(page.gotoLog).toEqual([{ url: 'https://mytax.test/_/', waitUntil: 'domcontentloaded' }]);
    });

    it('should raise a navigation error when the site cannot be loaded', async () => {
      const { page, site } = createSite();
      page.gotoError = new TypeError('Invalid URL');

      const failure = site.open('https://mytax.test/_/');

      await expect(failure).rejects.toBeInstanceOf(NavigationError);
      await expect(failure).rejects.toMatchObject({
        message: 'Could not load https://mytax.test/_/. Compliance status cannot be determined.',
        details: 'Navigation error: Invalid URL',
      });
      expect(page.gotoLog).toHaveLength(1);
    });
  });

  describe('dismissSecurityWarning', () => {
    it('should report false when no warning is shown', async () => {
      const { site } = createSite();
      expect(await site.dismissSecurityWarning()).toBe(false);
    });

    it('should click the start-over text when there is no link', async () => {
      const { page, site } = createSite();
      const startOver = page.add({ text: 'Click Here to Start Over' });

      expect(await site.dismissSecurityWarning()).toBe(true);
      expect(startOver.clicks).toBe(1);
    });
  });

  describe('openValidateForm', () => {
    it('should click the validate link', async () => {
      const { page, site } = createSite();
      const link = page.add({ role: 'link', name: 'Validate a Certificate of Clean Hands' });

      await site.openValidateForm();

      expect(link.clicks).toBe(1);
    });

    it('should fail when the link is missing', async () => {
      const { site } = createSite();
      await expect(site.openValidateForm()).rejects.toThrow(
        "Could not find the 'Validate a Certificate of Clean Hands' link."
      );
    });
  });

  describe('fillAndSearch', () => {
    it('should fill labelled fields and click Search', async () => {
      const { page, site } = createSite();
      const notice = page.add({ label: 'Notice Number', tag: 'input' });
      const last4 = page.add({ label: 'Last 4 Digits', tag: 'input' });
      const search = page.add({ role: 'button', name: 'Search' });

      await site.fillAndSearch({ notice: 'L0012345678', last4: '1234' });

      expect(notice.value).toBe('L0012345678');
      expect(last4.value).toBe('1234');
      expect(last4.clicks).toBe(1);
      expect(search.clicks).toBe(1);
      expect(last4.presses).toEqual([]);
    });

    it('should fall back to positional inputs and submit with Enter', async () => {
      const { page, site } = createSite();
      const first = page.add({ tag: 'input' });
      const second = page.add({ tag: 'input' });

      await site.fillAndSearch({ notice: 'L0012345678', last4: '1234' });

      expect(first.value).toBe('L0012345678');
      expect(second.value).toBe('1234');
      expect(second.presses).toEqual(['Enter']);
    });

    it('should fail when no notice field exists', async () => {
      const { site } = createSite();

      const failure = site.fillAndSearch({ notice: 'L0012345678', last4: '1234' });

      await expect(failure).rejects.toBeInstanceOf(FormError);
      await expect(failure).rejects.toThrow('Could not fill the Notice Number field.');
    });

    it('should fail when only one field exists', async () => {
      const { page, site } = createSite();
      page.add({ tag: 'input' });

      await expect(site.fillAndSearch({ notice: 'L0012345678', last4: '1234' })).rejects.toThrow(
        'Could not fill the Last 4 field.'
      );
    });
  });

  describe('readResultText', () => {
    it('should return the body text', async () => {
      const { page, site } = createSite();
      page.bodyText = 'This taxpayer is currently compliant';

      expect(await site.readResultText()).toBe('This taxpayer is currently compliant');
    });

    it('should return an empty string when the body cannot be read', async () => {
      const { page, site } = createSite();
      page.bodyText = new Error('Target page, context or browser has been closed');

      expect(await site.readResultText()).toBe('');
    });
  });

  describe('requestDocument', () => {
    it('should click request, Next and Submit', async () => {
      const { page, site } = createSite();
      const request = page.add({ role: 'link', name: 'Click here to request a Notice of Non-Compliance' });
      const next = page.add({ role: 'button', name: 'Next' });
      const submit = page.add({ role: 'button', name: 'Submit' });

      expect(await site.requestDocument()).toBe(true);
      expect([request.clicks, next.clicks, submit.clicks]).toEqual([1, 1, 1]);
    });

    it('should go straight to Submit when there is no Next button', async () => {
      const { page, site } = createSite();
      page.add({ role: 'link', name: 'Click here to request a current Certificate of Clean Hands' });
      const submit = page.add({ selectors: ["input[type='submit']"] });

      expect(await site.requestDocument()).toBe(true);
      expect(submit.clicks).toBe(1);
    });

    it('should report false without a request link', async () => {
      const { site } = createSite();
      expect(await site.requestDocument()).toBe(false);
    });

    it('should report false when Submit is missing', async () => {
      const { page, site } = createSite();
      page.add({ role: 'link', name: 'Click here to request a current Certificate of Clean Hands' });

      expect(await site.requestDocument()).toBe(false);
    });
  });

  describe('findViewTrigger', () => {
    it('should return the first view affordance', async () => {
      const { page, site } = createSite();
      const view = page.add({ role: 'link', name: 'View Certificate' });

      const trigger = await site.findViewTrigger();
      await trigger?.click();

      expect(trigger).not.toBeNull();
      expect(view.clicks).toBe(1);
    });

    it('should return null when nothing can be viewed', async () => {
      const { site } = createSite();
      expect(await site.findViewTrigger()).toBeNull();
    });
  });
});
