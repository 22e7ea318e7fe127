import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
  Req,
} from '@nestjs/common';
import type { Request } from 'express';

import { apiSuccess } from '../../common/http/api-response';
import { getRequestContext } from '../../common/http/request-context';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import { Auth } from '../auth/decorators/auth.decorator';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import type { SafeUser } from '../auth/types/auth.types';
import { CredentialsService } from './credentials.service';
import {
  createCredentialDtoSchema,
  type CreateCredentialDto,
} from './dto/create-credential.dto';
import {
  listCredentialsQuerySchema,
  type ListCredentialsQuery,
} from './dto/list-credentials.query';
import {
  updateCredentialDtoSchema,
  type UpdateCredentialDto,
} from './dto/update-credential.dto';

@Controller('credentials')
@Auth()
export class CredentialsController {
  constructor(private readonly credentialsService: CredentialsService) {}

  @Post()
  async create(
    @CurrentUser() user: SafeUser,
    @Body(new ZodValidationPipe(createCredentialDtoSchema))
    body: CreateCredentialDto,
    @Req() req: Request,
  ) {
    const credential = await this.credentialsService.create(
      user.id,
      body,
      getRequestContext(req),
    );

    return apiSuccess({ credential }, 'Credential created');
  }

  @Get()
  async list(
    @CurrentUser() user: SafeUser,
    @Query(new ZodValidationPipe(listCredentialsQuerySchema))
    query: ListCredentialsQuery,
  ) {
    const { items, pagination } = await this.credentialsService.list(
      user.id,
      query,
    );

    return apiSuccess({ credentials: items }, 'Credentials fetched', {
      pagination,
    });
  }

  @Get(':id')
  async findOne(
    @CurrentUser() user: SafeUser,
    @Param('id', new ParseUUIDPipe()) id: string,
    @Req() req: Request,
  ) {
    const credential = await this.credentialsService.findOne(
      user.id,
      id,
      getRequestContext(req),
    );

    return apiSuccess({ credential }, 'Credential fetched');
  }

  @Patch(':id')
  async update(
    @CurrentUser() user: SafeUser,
    @Param('id', new ParseUUIDPipe()) id: string,
    @Body(new ZodValidationPipe(updateCredentialDtoSchema))
    body: UpdateCredentialDto,
    @Req() req: Request,
  ) {
    const credential = await this.credentialsService.update(
      user.id,
      id,
      body,
      getRequestContext(req),
    );

    return apiSuccess({ credential }, 'Credential updated');
  }

  @Delete(':id')
  @HttpCode(200)
  async remove(
    @CurrentUser() user: SafeUser,
    @Param('id', new ParseUUIDPipe()) id: string,
    @Req() req: Request,
  ) {
    await this.credentialsService.remove(user.id, id, getRequestContext(req));

    return apiSuccess(null, 'Credential deleted');
  }
}
