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
import { createNoteDtoSchema, type CreateNoteDto } from './dto/create-note.dto';
import { listNotesQuerySchema, type ListNotesQuery } from './dto/list-notes.query';
import { updateNoteDtoSchema, type UpdateNoteDto } from './dto/update-note.dto';
import { NotesService } from './notes.service';

@Controller('notes')
@Auth()
export class NotesController {
  constructor(private readonly notesService: NotesService) {}

  @Post()
  async create(
    @CurrentUser() user: SafeUser,
    @Body(new ZodValidationPipe(createNoteDtoSchema))
    body: CreateNoteDto,
    @Req() req: Request,
  ) {
    const note = await this.notesService.create(
      user.id,
      body,
      getRequestContext(req),
    );

    return apiSuccess({ note }, 'Note created');
  }

  @Get()
  async list(
    @CurrentUser() user: SafeUser,
    @Query(new ZodValidationPipe(listNotesQuerySchema))
    query: ListNotesQuery,
  ) {
    const { items, pagination } = await this.notesService.list(user.id, query);

    return apiSuccess({ notes: items }, 'Notes fetched', { pagination });
  }

  @Get(':id')
  async findOne(
    @CurrentUser() user: SafeUser,
    @Param('id', new ParseUUIDPipe()) id: string,
    @Req() req: Request,
  ) {
    const note = await this.notesService.findOne(
      user.id,
      id,
      getRequestContext(req),
    );

    return apiSuccess({ note }, 'Note fetched');
  }

  @Patch(':id')
  async update(
    @CurrentUser() user: SafeUser,
    @Param('id', new ParseUUIDPipe()) id: string,
    @Body(new ZodValidationPipe(updateNoteDtoSchema))
    body: UpdateNoteDto,
    @Req() req: Request,
  ) {
    const note = await this.notesService.update(
      user.id,
      id,
      body,
      getRequestContext(req),
    );

    return apiSuccess({ note }, 'Note updated');
  }

  @Delete(':id')
  @HttpCode(200)
  async remove(
    @CurrentUser() user: SafeUser,
    @Param('id', new ParseUUIDPipe()) id: string,
    @Req() req: Request,
  ) {
    await this.notesService.remove(user.id, id, getRequestContext(req));

    return apiSuccess(null, 'Note deleted');
  }
}
