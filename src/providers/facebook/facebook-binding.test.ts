/**
 * Facebook binding tests
 */

import { expect } from 'chai';
import { ZodError } from 'zod';
import {
  FACEBOOK_API,
  facebookBinding,
  parseFacebookProfile,
  parseFacebookTokenResponse,
} from './facebook-binding.js';
import {
  InvalidResponseFormatError,
  SpecifiedProfileError,
} from '../../errors.js';
import { profileData, tokenData } from '../../fixtures/test-data.js';

describe('facebookBinding', () => {
  describe('parseTokenResponse', () => {
    it('parses a token with its lifetime', () => {
      expect(parseFacebookTokenResponse(tokenData.facebookBody)).to.deep.equal({
        accessToken: 'test-access-token',
        expiresIn: 3600,
      });
    });

    it('parses a token without a lifetime', () => {
      const tokenInfo = parseFacebookTokenResponse(
        tokenData.facebookBodyWithoutExpiry
      );

      expect(tokenInfo).to.deep.equal({ accessToken: 'test-access-token' });
      expect(tokenInfo).to.not.have.property('expiresIn');
    });

    it('rejects bodies without an access token', () => {
      ['', 'foo=bar', 'access_token=', 'expires=3600&access_token=abc'].forEach(
        (body) => {
          expect(() => parseFacebookTokenResponse(body)).to.throw(
            InvalidResponseFormatError,
            '[facebook] Invalid response format for accessToken'
          );
        }
      );
    });

    it('rejects a lifetime that is not a number', () => {
      expect(() =>
        parseFacebookTokenResponse('access_token=abc&expires=soon')
      ).to.throw(InvalidResponseFormatError);
    });

    it('rejects a lifetime beyond the safe integer range', () => {
      expect(() =>
        parseFacebookTokenResponse(
          'access_token=abc&expires=99999999999999999999'
        )
      ).to.throw(InvalidResponseFormatError);
    });

    it('rejects JSON bodies', () => {
      expect(() =>
        parseFacebookTokenResponse('{"access_token":"abc","expires_in":3600}')
      ).to.throw(InvalidResponseFormatError);
    });
  });

  describe('parseProfile', () => {
    it('maps every profile field', () => {
      expect(parseFacebookProfile(profileData.facebook)).to.deep.equal({
        providerUserID: '1000001',
        firstName: 'Ada',
        lastName: 'Example',
        fullName: 'Ada Example',
        avatarURL: 'https://images.example.com/ada.jpg',
        email: 'ada@example.com',
      });
    });

    it('leaves absent fields out', () => {
      const fields = parseFacebookProfile(profileData.facebookMinimal);

      expect(fields).to.deep.equal({
        providerUserID: '1000002',
        fullName: 'Bo Example',
      });
      expect(fields).to.not.have.property('avatarURL');
      expect(fields).to.not.have.property('email');
    });

    it('is a pure function of the document', () => {
      expect(parseFacebookProfile(profileData.facebook)).to.deep.equal(
        parseFacebookProfile(profileData.facebook)
      );
    });

    it('raises the provider error type and message', () => {
      let thrown: unknown;
      try {
        parseFacebookProfile(profileData.facebookError);
      } catch (error) {
        thrown = error;
      }

      expect(thrown).to.be.instanceOf(SpecifiedProfileError);
      if (thrown instanceof SpecifiedProfileError) {
        expect(thrown.errorType).to.equal('OAuthException');
        expect(thrown.errorMessage).to.equal('Invalid OAuth access token.');
      }
    });

    it('rejects a document without an id', () => {
      expect(() =>
        parseFacebookProfile({ name: 'Ada Example', email: 'ada@example.com' })
      ).to.throw(ZodError);
    });

    it('rejects an error object without type and message', () => {
      expect(() => parseFacebookProfile({ error: { code: 190 } })).to.throw(
        ZodError
      );
    });

    it('treats a non-object error field as absent', () => {
      expect(parseFacebookProfile({ id: '1000003', error: null })).to.deep.equal(
        { providerUserID: '1000003' }
      );
      expect(
        parseFacebookProfile({ id: '1000003', error: 'ignored' })
      ).to.deep.equal({ providerUserID: '1000003' });
    });

    it('leaves out null optional fields', () => {
      expect(
        parseFacebookProfile({
          id: '1000004',
          name: 'Cy Example',
          first_name: null,
          email: null,
          picture: { data: { url: null } },
        })
      ).to.deep.equal({ providerUserID: '1000004', fullName: 'Cy Example' });
    });

    it('leaves out optional fields of an unexpected type', () => {
      expect(
        parseFacebookProfile({
          id: '1000005',
          last_name: 42,
          email: ['ada@example.com'],
          picture: 'https://images.example.com/ada.jpg',
        })
      ).to.deep.equal({ providerUserID: '1000005' });
      expect(
        parseFacebookProfile({ id: '1000005', picture: { data: 'none' } })
      ).to.deep.equal({ providerUserID: '1000005' });
    });
  });

  describe('profileRequest', () => {
    it('passes the encoded token in the query string', () => {
      expect(
        facebookBinding.profileRequest({ accessToken: 'a+b/c' })
      ).to.deep.equal({ url: `${FACEBOOK_API}a%2Bb%2Fc` });
    });
  });
});
