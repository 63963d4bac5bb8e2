/**
 * Login Page Parser
 *
 * The portal login is an ASP.NET form: rollno, password, an antiforgery token
 * (__RequestVerificationToken) and a terms checkbox (chkterms).
 */

import * as cheerio from 'cheerio';
import { PageStructureError } from '../errors.js';
import type { PageParser } from './pageParser.js';

export interface LoginPage {
  csrfToken: string;
}

export const loginPageParser: PageParser<LoginPage> = {
  page: 'login',
  parse(html: string): LoginPage {
    const $ = cheerio.load(html);
    const token = $('input[name="__RequestVerificationToken"]').first().val();
    if (typeof token !== 'string' || token === '') {
      throw new PageStructureError('login', 'could not find the __RequestVerificationToken field');
    }
    return { csrfToken: token };
  },
};

/**
 * True when the HTML renders the student login form, i.e. we are not signed in
 */
export function hasLoginForm(html: string): boolean {
  const $ = cheerio.load(html);
  return $('input[name="rollno"]').length > 0 && $('input[type="password"], input[name="password"]').length > 0;
}

/**
 * True when the HTML shows the signed-in chrome (a logout link)
 */
export function looksSignedIn(html: string): boolean {
  const $ = cheerio.load(html);
  let signedIn = false;
  $('a').each((_, anchor) => {
    const href = ($(anchor).attr('href') ?? '').toLowerCase();
    const label = $(anchor).text().toLowerCase();
    if (href.includes('logout') || label.includes('logout') || label.includes('log out')) {
      signedIn = true;
      return false;
    }
    return undefined;
  });
  return signedIn;
}
