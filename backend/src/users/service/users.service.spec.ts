import { Test, TestingModule } from '@nestjs/testing';
import { HttpException } from '@nestjs/common';
import { TracedError, inhibitStackTrace } from '@logging';
import { UsersService } from '@users/service';
import { UsersOutPort } from '@users/out-ports';
import {
  USER_DISABLED,
  UserLookupError,
  UserNotFoundError,
} from '@users/value-objects';

describe('UsersService', () => {
  let service: UsersService;

  const mockOutPort = {
    findById: jest.fn(),
  };

  beforeAll(() => {
    inhibitStackTrace(UserNotFoundError);
  });

  beforeEach(async () => {
    mockOutPort.findById.mockReset();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UsersService,
        { provide: UsersOutPort, useValue: mockOutPort },
      ],
    }).compile();

    service = module.get<UsersService>(UsersService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('getUser', () => {
    it('should return an enabled user', async () => {
      const user = { id: '1', name: 'Ada', disabled: false };
      mockOutPort.findById.mockResolvedValue(user);

      await expect(service.getUser('1')).resolves.toBe(user);
    });

    it('should answer 404 without tracing a missing user', async () => {
      const notFound = new UserNotFoundError('9');
      mockOutPort.findById.mockRejectedValue(notFound);

      const err = await service.getUser('9').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(HttpException);
      if (err instanceof HttpException) {
        expect(err.getStatus()).toBe(404);
        expect(err.message).toBe('User not found');
        expect(err.cause).toBe(notFound);
      }
    });

    it('should reject a disabled user with the sentinel', async () => {
      mockOutPort.findById.mockResolvedValue({
        id: '2',
        name: 'Grace',
        disabled: true,
      });

      await expect(service.getUser('2')).rejects.toBe(USER_DISABLED);
    });

    it('should trace repository failures behind a 500 User error', async () => {
      const failure = new UserLookupError('x', new TypeError('malformed'));
      mockOutPort.findById.mockRejectedValue(failure);

      const err = await service.getUser('x').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(HttpException);
      if (err instanceof HttpException) {
        expect(err.getStatus()).toBe(500);
        expect(err.message).toBe('User error');
        expect(err.cause).toBeInstanceOf(TracedError);
        if (err.cause instanceof TracedError) {
          expect(err.cause.unwrap()).toBe(failure);
        }
      }
    });
  });
});
