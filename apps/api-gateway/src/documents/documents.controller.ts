import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { DocumentsService } from './documents.service';
import { DocumentResponseDto } from './dto/document-response.dto';
import { ListDocumentsQueryDto } from './dto/list-documents-query.dto';
import { UploadDocumentResponseDto } from './dto/upload-document-response.dto';

/**
 * Multer configuration: memory storage, so the buffer reaches
 * DocumentsService, which enforces UPLOAD_MAX_FILE_SIZE_MB with a
 * descriptive error. Multer's own limit is only a hard cap.
 */
const MULTER_OPTIONS = {
  storage: memoryStorage(),
  limits: {
    fileSize: 100 * 1024 * 1024, // 100 MB hard cap at Multer layer
  },
};

/**
 * REST controller for documents.
 *
 * Routes:
 *   POST /documents/upload: Store a file and queue it for extraction
 *   GET  /documents/:id   : One document record
 *   GET  /documents       : Paged listing, oldest first
 */
@Controller('documents')
export class DocumentsController {
  private readonly logger = new Logger(DocumentsController.name);

  constructor(private readonly documentsService: DocumentsService) {}

  /**
   * POST /documents/upload
   *
   * Accepts multipart/form-data with the document in the "file" field.
   *
   * Error responses:
   *   400: No file attached, or an empty one
   *   413: File exceeds size limit
   *   500: File or record could not be written
   *   503: Job queue unavailable (record stays PENDING)
   */
  @Post('upload')
  @UseInterceptors(FileInterceptor('file', MULTER_OPTIONS))
  @HttpCode(HttpStatus.CREATED)
  async uploadDocument(
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<UploadDocumentResponseDto> {
    this.logger.log(
      `Upload request: file="${file?.originalname ?? 'none'}", size=${file?.size ?? 0}`,
    );

    return this.documentsService.uploadDocument(file);
  }

  @Get(':id')
  getDocument(
    @Param('id', new ParseUUIDPipe()) id: string,
  ): Promise<DocumentResponseDto> {
    return this.documentsService.getDocument(id);
  }

  @Get()
  listDocuments(
    @Query() query: ListDocumentsQueryDto,
  ): Promise<DocumentResponseDto[]> {
    return this.documentsService.listDocuments(query.skip, query.limit);
  }
}
