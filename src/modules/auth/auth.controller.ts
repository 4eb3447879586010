import {
  Controller,
  Post,
  Get,
  Patch,
  Body,
  Query,
  HttpCode,
  HttpStatus,
  Req,
  UseGuards,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiBearerAuth, ApiQuery } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { Request } from 'express';
import { AuthService } from './auth.service';
import { RegisterDto } from './dto/register.dto';
import { LoginDto } from './dto/login.dto';
import { ExternalLoginDto } from './dto/external-login.dto';
import { RefreshTokenDto } from './dto/refresh-token.dto';
import { ChangePasswordDto } from './dto/change-password.dto';
import { UpdateProfileDto } from './dto/update-profile.dto';
import {
  ConfirmPasswordResetDto,
  RequestPasswordResetDto,
  VerifyEmailDto,
} from './dto/single-use-token.dto';
import {
  AccountResponseDto,
  AuthResponseDto,
  ExternalAuthResponseDto,
  RegistrationResponseDto,
} from './dto/auth-response.dto';
import { LoginThrottlerGuard } from './guards/login-throttler.guard';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { CurrentAccount } from './decorators/current-account.decorator';
import { AuthenticatedAccount } from './interfaces/authenticated-request.interface';
import {
  AccountView,
  AuthResult,
  ExternalAuthResult,
  RegistrationResult,
} from './interfaces/identity.interfaces';
import { extractClientIp } from '../../common/utils/extract-client-ip';

@ApiTags('Authentication')
@Controller('api/auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('register')
  @Throttle({ default: { limit: process.env.NODE_ENV === 'test' ? 1000 : 5, ttl: 3600000 } }) // 5 requests per hour (relaxed in test)
  @ApiOperation({ summary: 'Register a new account' })
  @ApiResponse({ status: 201, description: 'Account created', type: RegistrationResponseDto })
  @ApiResponse({ status: 400, description: 'Bad Request - Invalid email, username or password' })
  @ApiResponse({ status: 409, description: 'Conflict - Email, username or identity already taken' })
  @ApiResponse({ status: 429, description: 'Too Many Requests - Rate limit exceeded' })
  async register(@Body() registerDto: RegisterDto): Promise<RegistrationResult> {
    const { email, username, password, provider, providerId, ...profile } = registerDto;
    return this.authService.register({ email, username, password, provider, providerId, profile });
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  @UseGuards(LoginThrottlerGuard)
  @Throttle({ default: { limit: 5, ttl: 900000 } }) // 5 attempts per 15 minutes, tracked by email+IP
  @ApiOperation({ summary: 'Login with email and password' })
  @ApiResponse({ status: 200, description: 'Authenticated', type: AuthResponseDto })
  @ApiResponse({ status: 401, description: 'Unauthorized - Invalid email or password' })
  @ApiResponse({ status: 403, description: 'Forbidden - Account is not active' })
  @ApiResponse({ status: 429, description: 'Too Many Requests - Rate limit exceeded' })
  async login(@Body() loginDto: LoginDto, @Req() request: Request): Promise<AuthResult> {
    return this.authService.login({
      email: loginDto.email,
      password: loginDto.password,
      originAddress: extractClientIp(request),
    });
  }

  @Post('external-login')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 20, ttl: 900000 } })
  @ApiOperation({ summary: 'Sign in with an identity asserted by an external provider' })
  @ApiResponse({ status: 200, description: 'Authenticated', type: ExternalAuthResponseDto })
  @ApiResponse({ status: 403, description: 'Forbidden - Account is not active' })
  @ApiResponse({ status: 409, description: 'Conflict - Email belongs to another account' })
  async externalLogin(
    @Body() dto: ExternalLoginDto,
    @Req() request: Request,
  ): Promise<ExternalAuthResult> {
    const { provider, providerId, email, ...profile } = dto;
    return this.authService.externalLogin({
      provider,
      providerId,
      email,
      profile,
      originAddress: extractClientIp(request),
    });
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 10, ttl: 900000 } })
  @ApiOperation({ summary: 'Exchange a refresh token for a new token pair' })
  @ApiResponse({ status: 200, description: 'Tokens refreshed', type: AuthResponseDto })
  @ApiResponse({ status: 401, description: 'Unauthorized - Refresh token expired' })
  @ApiResponse({ status: 400, description: 'Bad Request - Refresh token invalid' })
  async refresh(@Body() dto: RefreshTokenDto): Promise<AuthResult> {
    return this.authService.refresh(dto.refreshToken);
  }

  @Post('verify-email')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Confirm an email address with a single-use token' })
  @ApiResponse({ status: 200, description: 'Email verified' })
  @ApiResponse({ status: 400, description: 'Bad Request - Token invalid' })
  @ApiResponse({ status: 401, description: 'Unauthorized - Token expired' })
  async verifyEmail(@Body() dto: VerifyEmailDto): Promise<{ verified: boolean }> {
    return this.authService.verifyEmail(dto.token);
  }

  @Post('verify-email/resend')
  @HttpCode(HttpStatus.OK)
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth('JWT-auth')
  @Throttle({ default: { limit: 3, ttl: 3600000 } })
  @ApiOperation({ summary: 'Issue a new verification token for the current account' })
  @ApiResponse({ status: 409, description: 'Conflict - Email already verified' })
  async resendVerification(
    @CurrentAccount() account: AuthenticatedAccount,
  ): Promise<{ sent: true }> {
    return this.authService.resendEmailVerification(account.id);
  }

  @Post('password-reset/request')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 3, ttl: 3600000 } })
  @ApiOperation({ summary: 'Request a password reset email' })
  @ApiResponse({ status: 200, description: 'Always acknowledged' })
  async requestPasswordReset(
    @Body() dto: RequestPasswordResetDto,
  ): Promise<{ acknowledged: true }> {
    return this.authService.requestPasswordReset(dto.email);
  }

  @Post('password-reset/confirm')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 5, ttl: 900000 } })
  @ApiOperation({ summary: 'Set a new password with a reset token' })
  @ApiResponse({ status: 400, description: 'Bad Request - Token invalid or weak password' })
  @ApiResponse({ status: 401, description: 'Unauthorized - Token expired' })
  async confirmPasswordReset(
    @Body() dto: ConfirmPasswordResetDto,
  ): Promise<{ success: boolean }> {
    return this.authService.confirmPasswordReset(dto.token, dto.newPassword);
  }

  @Post('change-password')
  @HttpCode(HttpStatus.OK)
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Change password for the current account' })
  @ApiResponse({ status: 400, description: 'Bad Request - No password set or policy violated' })
  @ApiResponse({ status: 401, description: 'Unauthorized - Current password incorrect' })
  async changePassword(
    @CurrentAccount() account: AuthenticatedAccount,
    @Body() dto: ChangePasswordDto,
  ): Promise<{ success: boolean }> {
    return this.authService.changePassword(account.id, dto.currentPassword, dto.newPassword);
  }

  @Get('me')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Get the current account' })
  @ApiResponse({ status: 200, type: AccountResponseDto })
  async me(@CurrentAccount() account: AuthenticatedAccount): Promise<AccountView> {
    return this.authService.getAccount(account.id);
  }

  @Patch('me')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Update profile, username or email of the current account' })
  @ApiResponse({ status: 200, type: AccountResponseDto })
  @ApiResponse({ status: 409, description: 'Conflict - Email or username already taken' })
  async updateProfile(
    @CurrentAccount() account: AuthenticatedAccount,
    @Body() dto: UpdateProfileDto,
  ): Promise<AccountView> {
    return this.authService.updateProfile(account.id, dto);
  }

  @Get('availability/email')
  @ApiOperation({ summary: 'Check whether an email is free to register' })
  @ApiQuery({ name: 'email', required: true })
  async checkEmail(@Query('email') email: string = ''): Promise<{ available: boolean }> {
    return this.authService.checkEmailAvailable(email);
  }

  @Get('availability/username')
  @ApiOperation({ summary: 'Check whether a username is free to register' })
  @ApiQuery({ name: 'username', required: true })
  async checkUsername(
    @Query('username') username: string = '',
  ): Promise<{ available: boolean }> {
    return this.authService.checkUsernameAvailable(username);
  }
}
