import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Param,
  Query,
  Body,
  HttpCode,
  HttpStatus,
  ParseUUIDPipe,
  Logger,
} from '@nestjs/common';
import { ApiTags, ApiBearerAuth, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { AuthService } from './auth.service';
import { AdminOnly } from './decorators/admin-only.decorator';
import { CurrentAccount } from './decorators/current-account.decorator';
import { AuthenticatedAccount } from './interfaces/authenticated-request.interface';
import {
  AdminCreateAccountDto,
  AdminUpdateAccountDto,
  BulkActionDto,
  ListAccountsQueryDto,
  PromoteAccountDto,
  SuspendAccountDto,
} from './dto/account-admin.dto';
import {
  AccountListResponseDto,
  AccountResponseDto,
  AccountStatisticsResponseDto,
  BulkActionResponseDto,
} from './dto/auth-response.dto';
import {
  AccountList,
  AccountStatistics,
  AccountView,
  BulkActionResult,
} from './interfaces/identity.interfaces';

@ApiTags('Admin - Accounts')
@ApiBearerAuth('JWT-auth')
@AdminOnly()
@Controller('api/admin/accounts')
export class AccountsAdminController {
  private readonly logger = new Logger(AccountsAdminController.name);

  constructor(private readonly authService: AuthService) {}

  @Get()
  @ApiOperation({ summary: 'Search and page through accounts' })
  @ApiResponse({ status: 200, type: AccountListResponseDto })
  async listAccounts(@Query() query: ListAccountsQueryDto): Promise<AccountList> {
    return this.authService.listAccounts(query);
  }

  @Get('statistics')
  @ApiOperation({ summary: 'Account counts by status' })
  @ApiResponse({ status: 200, type: AccountStatisticsResponseDto })
  async statistics(): Promise<AccountStatistics> {
    return this.authService.getStatistics();
  }

  @Post()
  @ApiOperation({ summary: 'Create an account without email verification' })
  @ApiResponse({ status: 201, type: AccountResponseDto })
  @ApiResponse({ status: 409, description: 'Email or username already taken' })
  async createAccount(
    @Body() dto: AdminCreateAccountDto,
    @CurrentAccount() admin: AuthenticatedAccount,
  ): Promise<AccountView> {
    const { email, username, password, role, status, emailVerified, ...profile } = dto;
    this.logger.log(`Admin ${admin.id} creating account ${email}`);
    return this.authService.createAccountByAdmin({
      email,
      username,
      password,
      profile,
      role,
      status,
      emailVerified,
    });
  }

  @Post('bulk-action')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Apply one action to many accounts; failures are reported per id' })
  @ApiResponse({ status: 200, type: BulkActionResponseDto })
  async bulkAction(
    @Body() dto: BulkActionDto,
    @CurrentAccount() admin: AuthenticatedAccount,
  ): Promise<BulkActionResult> {
    this.logger.log(`Admin ${admin.id} running ${dto.action} on ${dto.accountIds.length} accounts`);
    return this.authService.bulkAction(dto);
  }

  @Get(':id')
  @ApiResponse({ status: 200, type: AccountResponseDto })
  @ApiResponse({ status: 404, description: 'Account not found' })
  async getAccount(@Param('id', ParseUUIDPipe) id: string): Promise<AccountView> {
    return this.authService.getAccount(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Edit identity, profile, role, status or verification' })
  @ApiResponse({ status: 200, type: AccountResponseDto })
  @ApiResponse({ status: 409, description: 'Conflict or illegal transition' })
  async updateAccount(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: AdminUpdateAccountDto,
    @CurrentAccount() admin: AuthenticatedAccount,
  ): Promise<AccountView> {
    this.logger.log(`Admin ${admin.id} updating account ${id}`);
    return this.authService.updateAccountByAdmin(id, dto);
  }

  @Post(':id/suspend')
  @HttpCode(HttpStatus.OK)
  @ApiResponse({ status: 409, description: 'Illegal transition' })
  async suspend(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: SuspendAccountDto,
    @CurrentAccount() admin: AuthenticatedAccount,
  ): Promise<AccountView> {
    this.logger.log(`Admin ${admin.id} suspending account ${id}`);
    return this.authService.suspend(id, body.reason ?? null);
  }

  @Post(':id/activate')
  @HttpCode(HttpStatus.OK)
  async activate(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentAccount() admin: AuthenticatedAccount,
  ): Promise<AccountView> {
    this.logger.log(`Admin ${admin.id} activating account ${id}`);
    return this.authService.activate(id);
  }

  @Post(':id/deactivate')
  @HttpCode(HttpStatus.OK)
  async deactivate(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentAccount() admin: AuthenticatedAccount,
  ): Promise<AccountView> {
    this.logger.log(`Admin ${admin.id} deactivating account ${id}`);
    return this.authService.deactivate(id);
  }

  @Post(':id/promote')
  @HttpCode(HttpStatus.OK)
  async promote(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: PromoteAccountDto,
    @CurrentAccount() admin: AuthenticatedAccount,
  ): Promise<AccountView> {
    this.logger.log(`Admin ${admin.id} promoting account ${id}`);
    return this.authService.promote(id, body.role);
  }

  @Post(':id/demote')
  @HttpCode(HttpStatus.OK)
  async demote(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentAccount() admin: AuthenticatedAccount,
  ): Promise<AccountView> {
    this.logger.log(`Admin ${admin.id} demoting account ${id}`);
    return this.authService.demote(id);
  }

  @Delete(':id')
  @ApiOperation({ summary: 'Soft delete; the row is kept with status deleted' })
  async softDelete(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentAccount() admin: AuthenticatedAccount,
  ): Promise<AccountView> {
    this.logger.warn(`Admin ${admin.id} deleting account ${id}`);
    return this.authService.softDelete(id);
  }

  @Delete(':id/hard')
  @ApiOperation({ summary: 'Remove the row permanently' })
  async hardDelete(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentAccount() admin: AuthenticatedAccount,
  ): Promise<{ deleted: true }> {
    this.logger.warn(`Admin ${admin.id} hard deleting account ${id}`);
    return this.authService.hardDelete(id);
  }
}
