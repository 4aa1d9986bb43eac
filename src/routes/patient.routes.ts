/**
 * Patient Routes
 *
 * POST   /api/pacientes              - Register a patient
 * GET    /api/pacientes              - List active patients (page, per_page, search)
 * GET    /api/pacientes/:id          - Read one
 * PUT    /api/pacientes/:id          - Partial update
 * DELETE /api/pacientes/:id          - Soft delete
 * PUT    /api/pacientes/:id/reativar - Reactivate
 */

import { Router, Response, NextFunction } from 'express';
import { AuthenticatedRequest } from '../types';
import { withTransaction } from '../models/db';
import * as patientService from '../services/patient.service';
import { requireAuth } from '../middleware/auth.middleware';
import { NotFoundError } from '../utils/errors.utils';
import { parseIdParam, requireBody } from '../utils/validation.utils';

const router = Router();

router.use('/pacientes', requireAuth);

function patientId(req: AuthenticatedRequest): number {
  return parseIdParam(req.params.id, new NotFoundError('Patient not found', 'PATIENT_NOT_FOUND'));
}

router.post('/pacientes', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const body = requireBody(req.body);
    const paciente = await withTransaction((tx) => patientService.createPatient(tx, body));

    res.status(201).json({
      success: true,
      message: 'Patient registered',
      data: { paciente },
    });
  } catch (error) {
    next(error);
  }
});

router.get('/pacientes', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const page = await withTransaction((tx) =>
      patientService.listPatients(tx, {
        page: req.query.page,
        per_page: req.query.per_page,
        search: req.query.search,
      })
    );

    res.status(200).json({
      success: true,
      data: { pacientes: page.items, pagination: page.pagination },
    });
  } catch (error) {
    next(error);
  }
});

router.get('/pacientes/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const id = patientId(req);
    const paciente = await withTransaction((tx) => patientService.getPatient(tx, id));

    res.status(200).json({
      success: true,
      data: { paciente },
    });
  } catch (error) {
    next(error);
  }
});

router.put('/pacientes/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const id = patientId(req);
    const body = requireBody(req.body);
    const paciente = await withTransaction((tx) => patientService.updatePatient(tx, id, body));

    res.status(200).json({
      success: true,
      message: 'Patient updated',
      data: { paciente },
    });
  } catch (error) {
    next(error);
  }
});

router.delete('/pacientes/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const id = patientId(req);
    await withTransaction((tx) => patientService.deactivatePatient(tx, id));

    res.status(200).json({
      success: true,
      message: 'Patient deactivated',
    });
  } catch (error) {
    next(error);
  }
});

router.put('/pacientes/:id/reativar', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  try {
    const id = patientId(req);
    const paciente = await withTransaction((tx) => patientService.reactivatePatient(tx, id));

    res.status(200).json({
      success: true,
      message: 'Patient reactivated',
      data: { paciente },
    });
  } catch (error) {
    next(error);
  }
});

export default router;
